export * from './guards.js';
export * from './ConnectTelescope.js';
export * from './DisconnectTelescope.js';
export * from './GetTelescopeStatus.js';
export * from './GotoCoordinates.js';
export * from './GotoTarget.js';
export * from './SearchTarget.js';
export * from './CheckTargetVisibility.js';
export * from './CheckSolarSafety.js';
export * from './StartImaging.js';
export * from './StartMosaicImaging.js';
export * from './StopImaging.js';
export * from './ParkTelescope.js';
export * from './UnparkTelescope.js';
export * from './EmergencyStop.js';
export * from './StartAutoFocus.js';
export * from './StartCalibration.js';
export * from './GetSystemInfo.js';
