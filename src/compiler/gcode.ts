/**
 * G-code rendering of commands, one line per command. Used by the Moonraker
 * controller and for audit output.
 *
 *   HOME      G28
 *   MOVE_REL  G91 G1 X10.0000 [F3000]
 *   MOVE_ABS  G90 G1 X150.0000 Y155.0000 [F2000]
 *   DWELL     G4 P2000             (milliseconds)
 *   SYNC      M400
 *   SPIN      M3 S100 P10000
 *   DISPENSE  M700 V5.0000
 *   ASPIRATE  M701 V1.0000
 *   READ      M702
 *   SET       M710 temperature S37.0000
 *   STOP      M112
 */

import { FEED_ARG } from '../device_registry';
import { Command, CommandStream } from './types';

const AXIS_ORDER = ['x', 'y', 'z'];

function fixed(value: number): string {
    return value.toFixed(4);
}

function plain(value: number): string {
    return String(Math.round(value * 1e4) / 1e4);
}

function ms(seconds: number): number {
    return Math.round(seconds * 1000);
}

function axisWords(args: Readonly<Record<string, number>>): string {
    const axes = Object.keys(args)
        .filter((k) => k !== FEED_ARG)
        .sort((a, b) => {
            const ia = AXIS_ORDER.indexOf(a);
            const ib = AXIS_ORDER.indexOf(b);
            if (ia !== -1 || ib !== -1) return (ia === -1 ? 99 : ia) - (ib === -1 ? 99 : ib);
            return a < b ? -1 : a > b ? 1 : 0;
        });
    const words = axes.map((axis) => `${axis.toUpperCase()}${fixed(args[axis])}`);
    const feed = args[FEED_ARG];
    if (feed !== undefined) words.push(`F${Math.round(feed)}`);
    return words.join(' ');
}

export function renderCommand(command: Pick<Command, 'opcode' | 'channel' | 'args'>): string {
    const args = command.args;
    switch (command.opcode) {
        case 'HOME':
            return 'G28';
        case 'MOVE_REL':
            return `G91 G1 ${axisWords(args)}`;
        case 'MOVE_ABS':
            return `G90 G1 ${axisWords(args)}`;
        case 'DWELL':
            return `G4 P${ms(args.duration)}`;
        case 'SYNC':
            return 'M400';
        case 'SPIN':
            return `M3 S${plain(args.speed)} P${ms(args.duration)}`;
        case 'DISPENSE':
            return `M700 V${fixed(args.volume)}`;
        case 'ASPIRATE':
            return `M701 V${fixed(args.volume)}`;
        case 'READ':
            return 'M702';
        case 'SET':
            return `M710 ${command.channel ?? ''} S${fixed(args.value)}`;
        case 'STOP':
            return 'M112';
    }
}

/** Full program text: millimetre units, then every command in order. */
export function renderStream(stream: CommandStream): string {
    return ['G21', ...stream.commands.map(renderCommand)].join('\n') + '\n';
}
