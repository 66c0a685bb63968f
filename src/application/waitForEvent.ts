import type { ITelescopeSession } from '../domain/ports/ITelescopeSession.js';
import type { InboundEvent } from '../domain/entities/TelescopeMessage.js';
import { ConnectionLostError } from '../domain/errors/TelescopeErrors.js';

export interface EventWait {
  /** Resolves with the first matching event, or null on timeout/cancel */
  readonly promise: Promise<InboundEvent | null>;
  cancel(): void;
}

/**
 * Start listening before the command that triggers the event is sent, so a
 * fast telescope cannot answer before anyone is waiting.
 *
 * Rejects with ConnectionLostError if the channel drops while waiting.
 */
export function waitForEvent(
  session: ITelescopeSession,
  matches: (event: InboundEvent) => boolean,
  timeoutMs: number
): EventWait {
  let cancel: () => void = () => undefined;

  const promise = new Promise<InboundEvent | null>((resolve, reject) => {
    const cleanup = (): void => {
      clearTimeout(timer);
      session.offEvent(onEvent);
      session.offConnectionStateChange(onState);
    };

    const onEvent = (event: InboundEvent): void => {
      if (!matches(event)) return;
      cleanup();
      resolve(event);
    };

    const onState = (state: string): void => {
      if (state !== 'reconnecting' && state !== 'disconnected') return;
      cleanup();
      reject(new ConnectionLostError(`connection ${state} while waiting for the telescope`, { state }));
    };

    const timer = setTimeout(() => {
      cleanup();
      resolve(null);
    }, timeoutMs);

    session.onEvent(onEvent);
    session.onConnectionStateChange(onState);

    cancel = () => {
      cleanup();
      resolve(null);
    };
  });

  // A caller whose command failed stops waiting and never awaits this
  promise.catch(() => undefined);

  return { promise, cancel: () => cancel() };
}
