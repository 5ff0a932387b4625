/**
 * Controller state
 *
 * Everything the tick carries from one run to the next, apart from relay
 * bookkeeping (owned by the relay dispatcher) and the arming flags (owned
 * by the trigger registry).
 */

import type { ControlStatus } from '$types/common';
import type { UserConfig } from '$types/config';
import type { RelayBaselines } from '@core/swapped-plugs';

export interface ControllerState {
    // ═══════════════════════════════════════════════════════════════
    // TIMING
    // ═══════════════════════════════════════════════════════════════
    startTime: number;
    lastTickAt: number | null;
    tickCount: number;

    // ═══════════════════════════════════════════════════════════════
    // CONFIGURATION
    // ═══════════════════════════════════════════════════════════════
    /** Last configuration that loaded and validated */
    config: UserConfig;
    /** Warnings of the last load, joined; logged again only when they change */
    configWarnings: string;

    // ═══════════════════════════════════════════════════════════════
    // SENSOR
    // ═══════════════════════════════════════════════════════════════
    lastTemperature: number | null;
    lastReadingAt: number | null;
    sensorActive: boolean;

    // ═══════════════════════════════════════════════════════════════
    // STATUS
    // ═══════════════════════════════════════════════════════════════
    status: ControlStatus | null;

    // ═══════════════════════════════════════════════════════════════
    // SWAPPED PLUG DETECTION
    // ═══════════════════════════════════════════════════════════════
    /** Temperature when each relay was first seen on */
    relayBaselines: RelayBaselines;

    // ═══════════════════════════════════════════════════════════════
    // ERROR TRACKING
    // ═══════════════════════════════════════════════════════════════
    /** Consecutive ticks with a config or sensor read failure */
    consecutiveErrors: number;
    lastError: string | null;
    /** Set when the current tick hit a read failure */
    tickFailed: boolean;
}
