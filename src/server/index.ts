export { ProtocolServer, truncateAddress } from './server.js';
export type { ProtocolServerOptions, RobustStartOptions, SweepReport } from './server.js';
export { CorsConfig, createCorsMiddleware, isOriginAllowed } from './cors.js';
export type { CorsPreset } from './cors.js';
export { StartupError, createProcessPortReclaimer, probeWalletServer } from './startup.js';
export type { PortOccupant, PortReclaimer, StartupErrorCode } from './startup.js';
export { PeriodicSweeper } from './sweeper.js';
export type { SweepTask, SweeperOptions } from './sweeper.js';
