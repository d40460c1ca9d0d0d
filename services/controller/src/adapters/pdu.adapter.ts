// services/controller/src/adapters/pdu.adapter.ts

import { updatePduSnapshot } from '../core/state.js'
import type { PduEvent } from '../devices/pdu/types.js'

/**
 * PduStateAdapter
 *
 * Translates PduEvent objects from every PduSessionService into
 * AppState.pdus[pduId] changes. Stateless: the events carry everything.
 */
export class PduStateAdapter {
    handle(evt: PduEvent): void {
        const id = evt.pduId

        switch (evt.kind) {
            /* ------------------------------------------------------------------ */
            /*  CONNECTION                                                        */
            /* ------------------------------------------------------------------ */

            case 'pdu-status': {
                updatePduSnapshot(id, { status: evt.status })
                return
            }

            case 'pdu-connection-changed': {
                updatePduSnapshot(id, {
                    connected: evt.connected,
                    authenticated: evt.authenticated,
                })
                return
            }

            /* ------------------------------------------------------------------ */
            /*  MODEL                                                             */
            /* ------------------------------------------------------------------ */

            case 'pdu-outlets-updated': {
                updatePduSnapshot(id, { outlets: evt.outlets })
                return
            }

            case 'pdu-groups-updated': {
                updatePduSnapshot(id, { groups: evt.groups })
                return
            }

            case 'pdu-sensors-updated': {
                updatePduSnapshot(id, { sensors: evt.sensors })
                return
            }

            case 'pdu-indicators-changed': {
                updatePduSnapshot(id, { indicators: evt.indicators })
                return
            }

            case 'pdu-mode-changed': {
                updatePduSnapshot(id, { mode: evt.mode })
                return
            }

            /* ------------------------------------------------------------------ */
            /*  COMMANDS                                                          */
            /* ------------------------------------------------------------------ */

            case 'pdu-command-armed': {
                updatePduSnapshot(id, { pending: evt.pending })
                return
            }

            case 'pdu-command-cleared': {
                updatePduSnapshot(id, { pending: null })
                return
            }

            case 'pdu-command-sent': {
                updatePduSnapshot(id, {
                    lastCommand: { text: evt.command, userInitiated: evt.userInitiated, at: evt.at },
                })
                return
            }

            case 'pdu-broadcast': {
                updatePduSnapshot(id, {
                    lastBroadcast: {
                        role: evt.role,
                        groupName: evt.groupName,
                        groupIndex: evt.groupIndex,
                        action: evt.action,
                        at: evt.at,
                    },
                })
                return
            }

            case 'pdu-health': {
                updatePduSnapshot(id, { health: evt.health })
                return
            }

            /* ------------------------------------------------------------------ */
            /*  ERRORS                                                            */
            /* ------------------------------------------------------------------ */

            case 'recoverable-error': {
                updatePduSnapshot(id, {
                    lastError: { category: evt.category, message: evt.error, at: evt.at },
                })
                return
            }

            case 'fatal-error': {
                updatePduSnapshot(id, {
                    lastError: { category: 'fatal', message: evt.error, at: evt.at },
                })
                return
            }

            // Logs reach clients through the log buffer, not the state
            case 'pdu-log':
                return
        }
    }
}
