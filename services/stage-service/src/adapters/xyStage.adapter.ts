import {
    getSnapshot,
    updateStageSnapshot,
} from '../core/state.js'
import type { BusEvent } from '../core/bus/types.js'
import type { StageEvent } from '../devices/xy-stage/types.js'

/**
 * XYStageStateAdapter
 *
 * Listens to StageEvent and BusEvent objects and translates them
 * into AppState.stage changes.
 *
 * Stateless: always trusts the events and the current snapshot.
 */
export class XYStageStateAdapter {
    handle(evt: StageEvent | BusEvent): void {
        switch (evt.kind) {
            /* ------------------------------------------------------------------ */
            /*  LIFECYCLE                                                         */
            /* ------------------------------------------------------------------ */

            case 'stage-transition': {
                const prev = getSnapshot().stage
                updateStageSnapshot({
                    phase: evt.to,
                    message: evt.to === 'faulted' ? prev.message : undefined,
                    referenced: evt.to === 'disconnected' ? false : prev.referenced,
                })
                return
            }

            case 'stage-connected': {
                updateStageSnapshot({
                    versions: { X: evt.versions.X, Y: evt.versions.Y },
                    lastError: null,
                })
                return
            }

            case 'stage-initialized':
                return

            case 'stage-referenced': {
                const prev = getSnapshot().stage
                updateStageSnapshot({
                    referenced: true,
                    position: evt.position,
                    stats: { references: prev.stats.references + 1 },
                })
                return
            }

            /* ------------------------------------------------------------------ */
            /*  MOTION                                                            */
            /* ------------------------------------------------------------------ */

            case 'stage-move-requested': {
                const prev = getSnapshot().stage
                updateStageSnapshot({
                    target: { ...evt.target },
                    message: evt.clamped ? 'target clamped to soft limits' : undefined,
                    stats: { moves: prev.stats.moves + 1, lastMoveAt: evt.at },
                })
                return
            }

            case 'stage-position': {
                updateStageSnapshot({
                    position: evt.position,
                    // a cleared cache means the stage lost its reference
                    ...(evt.source === 'cleared' ? { referenced: false } : {}),
                })
                return
            }

            case 'stage-axis-ready':
                return

            /* ------------------------------------------------------------------ */
            /*  ALARMS / ENABLE / ERRORS                                          */
            /* ------------------------------------------------------------------ */

            case 'stage-alarms': {
                updateStageSnapshot({ lastAlarms: evt.alarms })
                return
            }

            case 'stage-enabled': {
                updateStageSnapshot({ enabled: evt.enabled })
                return
            }

            case 'stage-fault': {
                const prev = getSnapshot().stage
                updateStageSnapshot({
                    message: `${evt.operation} failed: ${evt.error.message}`,
                    lastError: { kind: evt.error.kind, message: evt.error.message, at: evt.at },
                    stats: { faults: prev.stats.faults + 1 },
                })
                return
            }

            /* ------------------------------------------------------------------ */
            /*  BUS                                                               */
            /* ------------------------------------------------------------------ */

            case 'bus-opened': {
                updateStageSnapshot({
                    transport: {
                        kind: evt.transport === 'serial' ? 'serial' : 'sim',
                        path: evt.path ?? null,
                        open: true,
                    },
                })
                return
            }

            case 'bus-closed': {
                updateStageSnapshot({ transport: { open: false } })
                return
            }

            case 'bus-stray-frame':
            case 'bus-timeout':
            case 'bus-error':
                return
        }
    }
}
