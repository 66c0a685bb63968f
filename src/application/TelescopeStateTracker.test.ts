import { describe, it, expect, beforeEach } from 'vitest';
import { TelescopeStateTracker } from './TelescopeStateTracker.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import { createMockLogger } from '../test-support/FakeTelescope.js';
import { MockTelescopeSession } from '../test-support/MockTelescopeSession.js';

describe('TelescopeStateTracker', () => {
  let logger: ILogger;
  let session: MockTelescopeSession;
  let tracker: TelescopeStateTracker;

  beforeEach(() => {
    logger = createMockLogger();
    session = new MockTelescopeSession();
    tracker = new TelescopeStateTracker(session, logger, () => new Date('2024-10-15T04:00:00Z'));
    tracker.start();
  });

  it('should follow a goto from start to completion', () => {
    session.emitEvent({ Event: 'AutoGoto', state: 'start' });
    expect(tracker.snapshot().operation).toBe('slewing');

    session.emitEvent({ Event: 'AutoGoto', state: 'complete' });
    expect(tracker.snapshot()).toMatchObject({
      operation: 'idle',
      lastError: null,
      lastEvent: { name: 'AutoGoto', state: 'complete' },
    });
  });

  it('should record why a goto failed', () => {
    session.emitEvent({ Event: 'AutoGoto', state: 'fail', error: 'below horizon' });

    expect(tracker.snapshot()).toMatchObject({
      operation: 'error',
      lastError: 'Goto failed: below horizon',
    });
  });

  it('should count stacked and dropped frames', () => {
    tracker.markImagingStarted('M31');
    session.emitEvent({ Event: 'Stack', state: 'frame_complete', stacked_frame: 12, dropped_frame: 1 });
    session.emitEvent({ Event: 'Stack', state: 'frame_complete', stacked_frame: 13 });

    expect(tracker.imagingState()).toMatchObject({
      status: 'running',
      stackedFrames: 13,
      droppedFrames: 1,
      targetName: 'M31',
    });
    expect(tracker.snapshot().operation).toBe('imaging');
  });

  it('should finish imaging on a Stack complete event', () => {
    tracker.markImagingStarted(null);
    session.emitEvent({ Event: 'Stack', state: 'complete' });

    expect(tracker.imagingState().status).toBe('completed');
    expect(tracker.snapshot().operation).toBe('idle');
  });

  it('should track focusing and the solar scan', () => {
    session.emitEvent({ Event: 'AutoFocus', state: 'working' });
    expect(tracker.snapshot().operation).toBe('focusing');

    session.emitEvent({ Event: 'ScanSun', state: 'working' });
    expect(tracker.snapshot().operation).toBe('solar');
  });

  it('should go idle when the session disconnects', () => {
    session.emitEvent({ Event: 'AutoGoto', state: 'working' });
    session.changeState('disconnected');

    expect(tracker.snapshot().operation).toBe('idle');
  });

  it('should stop listening after stop()', () => {
    tracker.stop();
    session.emitEvent({ Event: 'AutoGoto', state: 'start' });

    expect(tracker.snapshot().operation).toBe('idle');
    expect(session.listenerCount).toBe(0);
  });

  it('should remember the last command with its time', () => {
    tracker.recordCommand('goto_target');

    expect(tracker.lastCommandInfo()).toEqual({ name: 'goto_target', at: '2024-10-15T04:00:00.000Z' });
  });
});
