import test from 'node:test';
import assert from 'node:assert/strict';

import { ProtocolKernel } from '../src/kernel';
import { CommandJournal } from '../src/runtime/journal';
import { RetryPolicy } from '../src/runtime/retry_policy';
import { fixtureRegistry } from './helpers/fixtures';
import { ScriptedController } from './helpers/scripted_controller';

function kernel(controller = new ScriptedController()): ProtocolKernel {
    return new ProtocolKernel({
        registry: fixtureRegistry(),
        controller,
        orchestrator: {
            journal: new CommandJournal({ path: ':memory:' }),
            policy: new RetryPolicy({ maxRetries: 1, backoffBaseMs: 1, backoffMaxMs: 1 }),
            ackTimeoutMs: 1000,
        },
    });
}

test('caches compile results by source text', () => {
    const k = kernel();
    const first = k.compile('dispense(deviceA, 5mL)');
    const second = k.compile('dispense(deviceA, 5mL)');

    assert.deepEqual(first, second);
    assert.notEqual(first, second);
    assert.deepEqual(k.cacheStats(), { hits: 1, misses: 1, size: 1 });
    k.close();
});

test('a caller editing its compile result does not change later cache hits', () => {
    const k = kernel();
    const source = 'dispense(deviceA, 1mL); dispense(deviceZ, 1mL)';
    const first = k.compile(source);
    assert.equal(first.diagnostics.length, 1);
    first.diagnostics.length = 0;

    const second = k.compile(source);
    assert.equal(second.diagnostics.length, 1);
    assert.equal(second.diagnostics[0].code, 'UNKNOWN_DEVICE');
    assert.deepEqual(k.cacheStats(), { hits: 1, misses: 1, size: 1 });
    k.close();
});

test('pretty prints method text in canonical form', () => {
    const k = kernel();
    assert.deepEqual(k.pretty('wait( 2s );dispense(deviceA,5mL)'), {
        ok: true,
        value: 'wait(2s)\ndispense(deviceA, 5mL)\n',
    });

    const broken = k.pretty('wait(2s');
    assert.equal(broken.ok, false);
    if (!broken.ok) {
        assert.equal(broken.error, 'UNEXPECTED_TOKEN');
        assert.match(broken.message, /^1:\d+: SyntaxError\[UNEXPECTED_TOKEN\] Unexpected end of input/);
    }
    k.close();
});

test('execute compiles and runs the method to completion', async () => {
    const controller = new ScriptedController();
    const k = kernel(controller);

    const started = k.execute('dispense(deviceA, 5mL)\nwait(2s)');
    assert.ok(started.ok);
    if (started.ok) {
        const outcome = await started.value.finished;
        assert.equal(outcome.status, 'Completed');
        assert.deepEqual(controller.dispatched.map((d) => d.opcode), ['DISPENSE', 'DWELL']);
        assert.equal(k.snapshot()?.acked, 2);
    }
    k.close();
});

test('execute refuses a method that does not compile', () => {
    const controller = new ScriptedController();
    const k = kernel(controller);

    assert.deepEqual(k.execute('dispense(deviceA, 1mL); dispense(deviceZ, 1mL)'), {
        ok: false,
        error: 'UNKNOWN_DEVICE',
        message: '1:25: SemanticError[UNKNOWN_DEVICE] Unknown device "deviceZ"',
    });
    assert.equal(controller.dispatched.length, 0);
    assert.equal(k.snapshot(), null);
    k.close();
});
