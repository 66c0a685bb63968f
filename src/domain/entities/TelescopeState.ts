import type { ConnectionState } from '../ports/ITelescopeSession.js';
import type { HorizontalCoordinates } from './ObserverLocation.js';

/**
 * Operation state derived from the event stream.
 */
export type TelescopeOperation =
  | 'idle'
  | 'slewing'
  | 'imaging'
  | 'focusing'
  | 'parked'
  | 'solar'
  | 'error';

export interface TelescopeStatus {
  connection: ConnectionState;
  operation: TelescopeOperation;
  rightAscensionHours: number | null;
  declinationDegrees: number | null;
  horizontal: HorizontalCoordinates | null;
  currentTarget: string | null;
  lastEvent: { name: string; state: string | null; at: string } | null;
  lastError: string | null;
  updatedAt: string;
}

export type ImagingStatus = 'stopped' | 'running' | 'completed' | 'error';

export interface ImagingState {
  status: ImagingStatus;
  stackedFrames: number;
  droppedFrames: number;
  targetName: string | null;
  lastUpdate: string | null;
}

export interface MosaicParams {
  width: number;
  height: number;
}

export interface ImagingParams {
  /** Seconds per sub-exposure */
  exposureTime: number;
  count: number;
  gain?: number;
  binning?: number;
  filterName?: string;
  mosaic?: MosaicParams;
}
