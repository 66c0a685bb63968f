import type { ConnectionState, ITelescopeSession } from '../domain/ports/ITelescopeSession.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import type { InboundEvent } from '../domain/entities/TelescopeMessage.js';
import type { ImagingState, TelescopeOperation } from '../domain/entities/TelescopeState.js';

export interface OperationSnapshot {
  operation: TelescopeOperation;
  currentTarget: string | null;
  lastEvent: { name: string; state: string | null; at: string } | null;
  lastError: string | null;
}

export interface CommandRecord {
  name: string;
  at: string;
}

const ACTIVE_STATES = new Set(['start', 'working', 'slewing']);

function counter(value: unknown): number | null {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : null;
}

/**
 * Derives what the telescope is doing from its event stream. The telescope
 * never reports this directly; it only announces progress of the operation
 * it was last asked to perform.
 */
export class TelescopeStateTracker {
  private operation: TelescopeOperation = 'idle';
  private currentTarget: string | null = null;
  private lastEvent: OperationSnapshot['lastEvent'] = null;
  private lastError: string | null = null;
  private lastCommand: CommandRecord | null = null;
  private imaging: ImagingState = {
    status: 'stopped',
    stackedFrames: 0,
    droppedFrames: 0,
    targetName: null,
    lastUpdate: null,
  };
  private watching = false;
  private readonly logger: ILogger;

  constructor(
    private readonly session: ITelescopeSession,
    logger: ILogger,
    private readonly now: () => Date = () => new Date()
  ) {
    this.logger = logger.child({ component: 'TelescopeStateTracker' });
  }

  start(): void {
    if (this.watching) return;
    this.watching = true;
    this.session.onEvent(this.handleEvent);
    this.session.onConnectionStateChange(this.handleConnectionState);
  }

  stop(): void {
    if (!this.watching) return;
    this.watching = false;
    this.session.offEvent(this.handleEvent);
    this.session.offConnectionStateChange(this.handleConnectionState);
  }

  snapshot(): OperationSnapshot {
    return {
      operation: this.operation,
      currentTarget: this.currentTarget,
      lastEvent: this.lastEvent,
      lastError: this.lastError,
    };
  }

  imagingState(): ImagingState {
    return { ...this.imaging };
  }

  lastCommandInfo(): CommandRecord | null {
    return this.lastCommand;
  }

  recordCommand(name: string): void {
    this.lastCommand = { name, at: this.now().toISOString() };
  }

  /** Set by use cases for operations that announce no events of their own */
  markOperation(operation: TelescopeOperation, currentTarget?: string | null): void {
    this.operation = operation;
    if (currentTarget !== undefined) this.currentTarget = currentTarget;
  }

  markImagingStarted(targetName: string | null): void {
    this.imaging = {
      status: 'running',
      stackedFrames: 0,
      droppedFrames: 0,
      targetName,
      lastUpdate: this.now().toISOString(),
    };
    this.operation = 'imaging';
  }

  markImagingStopped(): void {
    this.imaging = { ...this.imaging, status: 'stopped', lastUpdate: this.now().toISOString() };
    if (this.operation === 'imaging') this.operation = 'idle';
  }

  private readonly handleConnectionState = (state: ConnectionState): void => {
    if (state === 'disconnected') {
      this.operation = 'idle';
    }
  };

  private readonly handleEvent = (event: InboundEvent): void => {
    this.lastEvent = {
      name: event.name,
      state: event.state,
      at: new Date(event.receivedAt).toISOString(),
    };

    switch (event.kind) {
      case 'AutoGoto':
        this.onProgress(event, 'slewing', 'Goto');
        break;
      case 'AutoFocus':
        this.onProgress(event, 'focusing', 'Auto focus');
        break;
      case 'Stack':
        this.onStack(event);
        break;
      case 'ScanSun':
        if (event.state !== null && ACTIVE_STATES.has(event.state)) this.operation = 'solar';
        break;
      default:
        break;
    }
  };

  private onProgress(event: InboundEvent, active: TelescopeOperation, label: string): void {
    if (event.state !== null && ACTIVE_STATES.has(event.state)) {
      this.operation = active;
    } else if (event.state === 'complete') {
      this.operation = 'idle';
      this.lastError = null;
    } else if (event.state === 'fail') {
      this.operation = 'error';
      this.lastError = `${label} failed: ${event.error ?? 'unknown error'}`;
      this.logger.warn('Telescope reported a failure', { event: event.name, error: event.error });
    }
  }

  private onStack(event: InboundEvent): void {
    const stacked = counter(event.payload.stacked_frame);
    const dropped = counter(event.payload.dropped_frame);
    const at = new Date(event.receivedAt).toISOString();

    let status = this.imaging.status;
    switch (event.state) {
      case 'start':
      case 'working':
      case 'frame_complete':
        status = 'running';
        this.operation = 'imaging';
        break;
      case 'complete':
        status = 'completed';
        this.operation = 'idle';
        break;
      case 'cancel':
        status = 'stopped';
        this.operation = 'idle';
        break;
      case 'fail':
        status = 'error';
        this.operation = 'error';
        this.lastError = `Stacking failed: ${event.error ?? 'unknown error'}`;
        break;
      default:
        break;
    }

    this.imaging = {
      ...this.imaging,
      status,
      stackedFrames: stacked ?? this.imaging.stackedFrames,
      droppedFrames: dropped ?? this.imaging.droppedFrames,
      lastUpdate: at,
    };
  }
}
