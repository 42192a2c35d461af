/**
 * Terminal Host
 *
 * Drives a SystemMonitor on terminal streams: delivers resize, tick and
 * keypress events one at a time, schedules the self-rearming refresh timer,
 * and redraws the screen after every state change. Quit keys are handled
 * here and never reach the monitor. An event that throws restores the
 * terminal and rejects the promise returned by start().
 */

import { EventEmitter } from 'node:events';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import type { SystemMonitor } from '../system-monitor/system-monitor.js';
import type { MonitorEvent, TickCommand } from '../types/events.js';

export interface HostInput extends EventEmitter {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  resume(): unknown;
  pause(): unknown;
}

export interface HostOutput extends EventEmitter {
  columns?: number;
  rows?: number;
  write(chunk: string): boolean;
}

/** Shape of the key object emitted with readline 'keypress' events */
export interface KeypressInfo {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
}

export interface TerminalHostOptions {
  input: HostInput;
  output: HostOutput;
  now?: () => Date;
}

const ENTER_ALT_SCREEN = '\u001B[?1049h';
const LEAVE_ALT_SCREEN = '\u001B[?1049l';
const HIDE_CURSOR = '\u001B[?25l';
const SHOW_CURSOR = '\u001B[?25h';
const CLEAR_SCREEN = '\u001B[H\u001B[2J';

export function isQuitKey(key: KeypressInfo | undefined, text: string | undefined): boolean {
  if (key?.ctrl && key.name === 'c') {
    return true;
  }
  const pressed = key?.name ?? text;
  return pressed === 'q' || pressed === 'Q';
}

export class TerminalHost extends EventEmitter {
  private readonly logger = createSubsystemLogger('monitor/host');
  private readonly input: HostInput;
  private readonly output: HostOutput;
  private readonly now: () => Date;
  private timer?: NodeJS.Timeout;
  private running = false;
  private resolveStopped?: () => void;
  private rejectStopped?: (error: unknown) => void;
  private failure?: { error: unknown };
  private lastFrame = '';

  private readonly onKeypress = (text: string | undefined, key: KeypressInfo | undefined): void => {
    if (isQuitKey(key, text)) {
      this.stop();
      return;
    }
    this.dispatch({ type: 'keypress', key: key?.name ?? text ?? '' });
  };

  private readonly onResize = (): void => {
    this.dispatch({ type: 'resize', width: this.output.columns ?? 0, height: this.output.rows ?? 0 });
  };

  constructor(
    private readonly monitor: SystemMonitor,
    options: TerminalHostOptions,
  ) {
    super();
    this.input = options.input;
    this.output = options.output;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Takes over the terminal. Resolves once the host has been stopped.
   */
  start(): Promise<void> {
    if (this.running) {
      return Promise.reject(new Error('Terminal host is already running'));
    }
    this.running = true;
    this.failure = undefined;

    const stopped = new Promise<void>((resolve, reject) => {
      this.resolveStopped = resolve;
      this.rejectStopped = reject;
    });

    this.output.write(ENTER_ALT_SCREEN + HIDE_CURSOR);
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(true);
    }
    this.input.on('keypress', this.onKeypress);
    this.input.resume();
    this.output.on('resize', this.onResize);

    this.logger.info('Terminal host started', {
      columns: this.output.columns,
      rows: this.output.rows,
    });
    this.emit('started');

    this.onResize();
    this.schedule(this.monitor.initialize());

    return stopped;
  }

  /**
   * Restores the terminal and cancels the pending tick. Safe to call twice.
   */
  stop(): void {
    if (!this.running) {
      return;
    }
    this.running = false;

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    this.input.off('keypress', this.onKeypress);
    this.output.off('resize', this.onResize);
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(false);
    }
    this.input.pause();
    this.output.write(SHOW_CURSOR + LEAVE_ALT_SCREEN);

    this.logger.info('Terminal host stopped');
    this.emit('stopped');
    if (this.failure) {
      this.rejectStopped?.(this.failure.error);
    } else {
      this.resolveStopped?.();
    }
    this.resolveStopped = undefined;
    this.rejectStopped = undefined;
  }

  isRunning(): boolean {
    return this.running;
  }

  hasPendingTick(): boolean {
    return this.timer !== undefined;
  }

  /**
   * Delivers one event to the monitor, schedules any follow-up tick and redraws.
   */
  dispatch(event: MonitorEvent): void {
    if (!this.running) {
      return;
    }
    try {
      const command = this.monitor.update(event);
      if (command) {
        this.schedule(command);
      }
      this.draw();
    } catch (error) {
      this.logger.error('Monitor event failed, restoring terminal', {
        event: event.type,
        error: String(error),
      });
      this.failure = { error };
      this.stop();
    }
  }

  private schedule(command: TickCommand): void {
    if (!this.running) {
      return;
    }
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.dispatch({ type: 'tick', timestamp: this.now() });
    }, command.delayMs);
  }

  private draw(): void {
    const frame = this.monitor.render();
    this.lastFrame = frame;
    this.output.write(CLEAR_SCREEN + frame.replace(/\n/g, '\r\n'));
    this.emit('frame', frame);
  }

  getLastFrame(): string {
    return this.lastFrame;
  }
}
