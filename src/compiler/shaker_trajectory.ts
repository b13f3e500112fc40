/**
 * Shaker motion paths. A `mix` on a shaker is a sequence of absolute points
 * sampled along an orbital, linear or helical path.
 */

import { SHAKER_DEFAULTS, ShakerSettingKey } from '../config';
import { MixMode } from './types';

export interface TrajectoryPoint {
    x: number;
    y: number;
    /** Only set for helical paths */
    z?: number;
}

export interface Trajectory {
    points: TrajectoryPoint[];
    /** Feed rate for the path, mm/min */
    feed: number;
}

export type ShakerSettings = Readonly<Partial<Record<ShakerSettingKey, number>>>;

export function setting(settings: ShakerSettings, key: ShakerSettingKey): number {
    return settings[key] ?? SHAKER_DEFAULTS[key];
}

/** Samples per second of motion; longer runs are sampled more coarsely. */
export function pointDensity(durationS: number): number {
    if (durationS <= 5) return 50;
    if (durationS <= 10) return 30;
    return 20;
}

export function round4(value: number): number {
    return Math.round(value * 1e4) / 1e4;
}

/** Evenly spaced sample times over [0, duration], both ends included. */
export function sampleTimes(durationS: number): number[] {
    const count = Math.floor(durationS * pointDensity(durationS)) + 1;
    if (count === 1) return [0];
    const step = durationS / (count - 1);
    return Array.from({ length: count }, (_, i) => i * step);
}

export function buildTrajectory(
    mode: MixMode,
    speedRpm: number,
    durationS: number,
    settings: ShakerSettings = {},
    center: Readonly<Partial<Record<'x' | 'y' | 'z', number>>> = {}
): Trajectory {
    const rps = speedRpm / 60;
    const omega = 2 * Math.PI * rps;
    const cx = center.x ?? setting(settings, 'centerX');
    const cy = center.y ?? setting(settings, 'centerY');
    const times = sampleTimes(durationS);

    switch (mode) {
        case 'orbital': {
            const r = setting(settings, 'orbitRadius');
            return {
                points: times.map((t) => ({
                    x: round4(cx + r * Math.cos(omega * t)),
                    y: round4(cy + r * Math.sin(omega * t)),
                })),
                feed: round4(Math.max(setting(settings, 'minFeed'), 2 * Math.PI * r * rps * 60)),
            };
        }
        case 'linear': {
            const a = setting(settings, 'linearAmplitude');
            return {
                points: times.map((t) => ({
                    x: round4(cx),
                    y: round4(cy + a * Math.sin(omega * t)),
                })),
                feed: round4(Math.max(setting(settings, 'minFeed'), 4 * a * rps * 60)),
            };
        }
        case 'helical': {
            const r = setting(settings, 'helicalRadius');
            const halfZ = setting(settings, 'helicalAmplitudeZ') / 2;
            const cz = center.z ?? setting(settings, 'centerZ');
            // Z travel is slow on these machines, so the helical feed is capped rather than floored.
            return {
                points: times.map((t) => ({
                    x: round4(cx + r * Math.cos(omega * t)),
                    y: round4(cy + r * Math.sin(omega * t)),
                    z: round4(cz + halfZ * Math.sin(omega * t)),
                })),
                feed: round4(Math.min(setting(settings, 'helicalMaxFeed'), 2 * Math.PI * r * rps * 60)),
            };
        }
    }
}
