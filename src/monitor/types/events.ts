/**
 * Messages exchanged between the host runtime and the monitor.
 */

export type MonitorEvent =
  | { type: 'resize'; width: number; height: number }
  | { type: 'tick'; timestamp: Date }
  | { type: 'keypress'; key: string };

/** Asks the host to deliver one tick after the given delay */
export interface TickCommand {
  type: 'tick';
  delayMs: number;
}
