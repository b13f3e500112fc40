import * as path from 'path';
import { InMemoryDeviceRegistry, loadDeviceRegistry } from '../../src/device_registry';

export const FIXTURE_DIR = path.join(__dirname, '..', 'fixtures');

export function fixtureRegistry(): InMemoryDeviceRegistry {
    return loadDeviceRegistry(path.join(FIXTURE_DIR, 'devices.json'));
}

export function tick(): Promise<void> {
    return new Promise((resolve) => setImmediate(resolve));
}
