export { ImouApiClient } from "./api/client";
export { ImouCamChannel } from "./channel/channel";
export { ImouDiscoverService } from "./channel/discovery";
export { ImouButton, ImouEntity, ImouSelect, ImouSensor } from "./channel/entity";
export type { ImouChannelEntity, WakeupTarget } from "./channel/entity";
export { ImouDataUpdateCoordinator } from "./coordinator";
export { createApiClient, discover, setupChannel } from "./setup";
export type { ImouChannelOptions, ImouChannelSetup, ImouConnectionOptions } from "./setup";
export { createLogger } from "./logger";
export type { ImouLogger } from "./logger";
export * from "./constants";
export * from "./enums";
export * from "./exceptions";
export * from "./types";
