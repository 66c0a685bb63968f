import type { ITelescopeSession } from "../domain/ports/ITelescopeSession.js";
import type { ILogger } from "../domain/ports/ILogger.js";
import type { ObserverLocation } from "../domain/entities/ObserverLocation.js";
import type {
  ImagingParams,
  ImagingState,
  TelescopeStatus,
} from "../domain/entities/TelescopeState.js";
import type { TargetResolver } from "../application/TargetResolver.js";
import type { LocationInfo, LocationManager } from "../application/LocationManager.js";
import { TelescopeStateTracker } from "../application/TelescopeStateTracker.js";
import {
  CheckSolarSafety,
  CheckTargetVisibility,
  ConnectTelescope,
  DisconnectTelescope,
  EmergencyStop,
  GetSystemInfo,
  GetTelescopeStatus,
  GotoCoordinates,
  GotoTarget,
  ParkTelescope,
  SearchTarget,
  StartAutoFocus,
  StartCalibration,
  StartImaging,
  StartMosaicImaging,
  StopImaging,
  UnparkTelescope,
  type AutoFocusOutput,
  type CheckTargetVisibilityOutput,
  type ConnectTelescopeInput,
  type ConnectTelescopeOutput,
  type GotoCoordinatesInput,
  type GotoOutput,
  type GotoTargetInput,
  type GotoTargetOutput,
  type ImagingOutput,
  type MountOutput,
  type SearchTargetOutput,
  type SolarSafetyReport,
  type StartMosaicImagingInput,
  type StartMosaicImagingOutput,
  type SystemInfo,
} from "../application/use-cases/index.js";

export interface TelescopeControllerConfig {
  version: string;
  gotoTimeoutMs?: number;
  autoFocusTimeoutMs?: number;
  startedAt?: Date;
  now?: () => Date;
}

/**
 * Entry point for every telescope operation. Composes the use cases over one
 * session and remembers the last command for diagnostics.
 */
export class TelescopeController {
  private readonly tracker: TelescopeStateTracker;
  private readonly connectUseCase: ConnectTelescope;
  private readonly disconnectUseCase: DisconnectTelescope;
  private readonly statusUseCase: GetTelescopeStatus;
  private readonly gotoCoordinatesUseCase: GotoCoordinates;
  private readonly gotoTargetUseCase: GotoTarget;
  private readonly searchTargetUseCase: SearchTarget;
  private readonly visibilityUseCase: CheckTargetVisibility;
  private readonly solarSafetyUseCase: CheckSolarSafety;
  private readonly startImagingUseCase: StartImaging;
  private readonly mosaicImagingUseCase: StartMosaicImaging;
  private readonly stopImagingUseCase: StopImaging;
  private readonly parkUseCase: ParkTelescope;
  private readonly unparkUseCase: UnparkTelescope;
  private readonly emergencyStopUseCase: EmergencyStop;
  private readonly autoFocusUseCase: StartAutoFocus;
  private readonly calibrationUseCase: StartCalibration;
  private readonly systemInfoUseCase: GetSystemInfo;

  constructor(
    private readonly session: ITelescopeSession,
    private readonly resolver: TargetResolver,
    private readonly locationManager: LocationManager,
    private readonly logger: ILogger,
    config: TelescopeControllerConfig
  ) {
    const now = config.now ?? (() => new Date());
    this.tracker = new TelescopeStateTracker(session, logger, now);

    this.connectUseCase = new ConnectTelescope(session, logger);
    this.disconnectUseCase = new DisconnectTelescope(session, logger);
    this.statusUseCase = new GetTelescopeStatus(session, this.tracker, locationManager, logger, now);
    this.gotoCoordinatesUseCase = new GotoCoordinates(
      session,
      locationManager,
      this.tracker,
      logger,
      config.gotoTimeoutMs
    );
    this.gotoTargetUseCase = new GotoTarget(
      session,
      resolver,
      locationManager,
      this.gotoCoordinatesUseCase,
      this.tracker,
      logger
    );
    this.searchTargetUseCase = new SearchTarget(resolver, logger);
    this.visibilityUseCase = new CheckTargetVisibility(resolver, locationManager, logger);
    this.solarSafetyUseCase = new CheckSolarSafety(resolver, locationManager, logger);
    this.startImagingUseCase = new StartImaging(session, this.tracker, logger);
    this.mosaicImagingUseCase = new StartMosaicImaging(
      this.gotoTargetUseCase,
      this.startImagingUseCase,
      logger
    );
    this.stopImagingUseCase = new StopImaging(session, this.tracker, logger);
    this.parkUseCase = new ParkTelescope(session, this.tracker, logger);
    this.unparkUseCase = new UnparkTelescope(session, this.tracker, logger);
    this.emergencyStopUseCase = new EmergencyStop(session, this.tracker, logger);
    this.autoFocusUseCase = new StartAutoFocus(
      session,
      this.tracker,
      logger,
      config.autoFocusTimeoutMs
    );
    this.calibrationUseCase = new StartCalibration(logger);
    this.systemInfoUseCase = new GetSystemInfo(session, resolver, this.tracker, logger, {
      version: config.version,
      startedAt: config.startedAt ?? now(),
      now,
    });
  }

  /**
   * Start following telescope events
   */
  start(): void {
    this.tracker.start();
    this.logger.info("Telescope controller started");
  }

  /**
   * Stop following events and close the control channel
   */
  async stop(): Promise<void> {
    this.tracker.stop();
    await this.session.disconnect();
    this.logger.info("Telescope controller stopped");
  }

  /**
   * Re-read the pointing state after the session came back on its own
   */
  async resyncAfterReconnect(): Promise<TelescopeStatus> {
    this.logger.info("Resyncing telescope state after reconnect");
    return this.statusUseCase.execute();
  }

  connect(params?: ConnectTelescopeInput): Promise<ConnectTelescopeOutput> {
    this.tracker.recordCommand("connect");
    return this.connectUseCase.execute(params);
  }

  disconnect(): Promise<{ success: boolean; message: string }> {
    this.tracker.recordCommand("disconnect");
    return this.disconnectUseCase.execute();
  }

  /**
   * Give up on an automatic reconnection loop without ending the session,
   * so a later connect can still reach the telescope.
   */
  stopReconnecting(): { success: boolean; message: string } {
    this.tracker.recordCommand("stop_reconnecting");
    const state = this.session.connectionState;
    if (state !== "reconnecting") {
      return { success: false, message: `Not reconnecting (state: ${state})` };
    }
    this.session.stopReconnecting();
    this.logger.info("Automatic reconnection stopped on request");
    return { success: true, message: "Stopped reconnecting to the telescope" };
  }

  getStatus(): Promise<TelescopeStatus> {
    return this.statusUseCase.execute();
  }

  gotoTarget(name: string, options: Omit<GotoTargetInput, "name"> = {}): Promise<GotoTargetOutput> {
    this.tracker.recordCommand("goto_target");
    return this.gotoTargetUseCase.execute({ ...options, name });
  }

  gotoCoordinates(input: GotoCoordinatesInput): Promise<GotoOutput> {
    this.tracker.recordCommand("goto_coordinates");
    return this.gotoCoordinatesUseCase.execute(input);
  }

  searchTarget(name: string): Promise<SearchTargetOutput> {
    this.tracker.recordCommand("search_target");
    return this.searchTargetUseCase.execute(name);
  }

  checkTargetVisibility(name: string, at?: Date): Promise<CheckTargetVisibilityOutput> {
    this.tracker.recordCommand("check_target_visibility");
    return this.visibilityUseCase.execute(name, at);
  }

  checkSolarSafety(): Promise<SolarSafetyReport> {
    this.tracker.recordCommand("check_solar_safety");
    return this.solarSafetyUseCase.execute();
  }

  startImaging(params: ImagingParams): Promise<ImagingOutput> {
    this.tracker.recordCommand("start_imaging");
    return this.startImagingUseCase.execute(params);
  }

  startMosaicImaging(input: StartMosaicImagingInput): Promise<StartMosaicImagingOutput> {
    this.tracker.recordCommand("start_mosaic_imaging");
    return this.mosaicImagingUseCase.execute(input);
  }

  stopImaging(): Promise<ImagingOutput> {
    this.tracker.recordCommand("stop_imaging");
    return this.stopImagingUseCase.execute();
  }

  getImagingStatus(): ImagingState {
    return this.tracker.imagingState();
  }

  park(equatorialMode = false): Promise<MountOutput> {
    this.tracker.recordCommand("park");
    return this.parkUseCase.execute(equatorialMode);
  }

  unpark(): Promise<MountOutput> {
    this.tracker.recordCommand("unpark");
    return this.unparkUseCase.execute();
  }

  emergencyStop(): Promise<MountOutput> {
    this.tracker.recordCommand("emergency_stop");
    return this.emergencyStopUseCase.execute();
  }

  startAutoFocus(): Promise<AutoFocusOutput> {
    this.tracker.recordCommand("auto_focus");
    return this.autoFocusUseCase.execute();
  }

  startCalibration(): Promise<never> {
    this.tracker.recordCommand("start_calibration");
    return this.calibrationUseCase.execute();
  }

  getSystemInfo(): Promise<SystemInfo> {
    return this.systemInfoUseCase.execute();
  }

  setLocation(location: ObserverLocation): LocationInfo {
    this.tracker.recordCommand("set_location");
    this.locationManager.configure(location);
    return this.locationManager.getLocationInfo();
  }

  /** null until a location has been set */
  getLocation(): LocationInfo | null {
    return this.locationManager.isConfigured ? this.locationManager.getLocationInfo() : null;
  }

  clearTargetCache(): void {
    this.resolver.clearCache();
  }
}
