/** Default Imou open API endpoint */
export const DEFAULT_API_URL = "https://openapi.easy4ip.com/openapi";

/** Request timeout in seconds */
export const DEFAULT_TIMEOUT = 10;

/** How many times a call is re-issued after the access token expired */
export const MAX_RETRIES = 3;

/** Seconds to wait for an image to be available before downloading it */
export const CAMERA_WAIT_BEFORE_DOWNLOAD = 1.5;

/** Seconds to wait after waking up a dormant device */
export const WAIT_AFTER_WAKE_UP = 4.0;

/** Polling interval in seconds */
export const DEFAULT_SCAN_INTERVAL = 15 * 60;

export const UNKNOWN = "UNKNOWN";

/** Device online status codes as returned by deviceOnline */
export const ONLINE_STATUS = {
  "0": "Offline",
  "1": "Online",
  "4": "Dormant",
  UNKNOWN: "Unknown",
} as const;

export type OnlineStatusCode = keyof typeof ONLINE_STATUS;
export type OnlineStatusLabel = (typeof ONLINE_STATUS)[OnlineStatusCode];

/** PTZ operation codes accepted by controlMovePTZ */
export const PTZ_OPERATIONS = {
  UP: 0,
  DOWN: 1,
  LEFT: 2,
  RIGHT: 3,
  UPPER_LEFT: 4,
  BOTTOM_LEFT: 5,
  UPPER_RIGHT: 6,
  BOTTOM_RIGHT: 7,
  ZOOM_IN: 8,
  ZOOM_OUT: 9,
  STOP: 10,
} as const;

export const BUTTONS = {
  restartDevice: "Restart device",
  turnCollection: "Turn to",
} as const;

export const SENSORS = {
  status: "Status",
} as const;

export const SELECTS = {
  turnCollection: "Turn to favourite point",
} as const;

export type ButtonType = keyof typeof BUTTONS;
export type SensorType = keyof typeof SENSORS;
export type SelectType = keyof typeof SELECTS;

export const SENSOR_ICONS: Readonly<Record<string, string>> = {
  __default__: "mdi:bookmark",
  restartDevice: "mdi:restart",
  turnCollection: "mdi:cctv",
  status: "mdi:lan-connect",
};

/** Placeholder occupying index 0 of every select option list */
export const SELECT_SENTINEL = "⬇ Select a point ⬇";

/** Ability flag reported by devices that support dormant (sleep) mode */
export const DORMANT_ABILITY = "Dormant";

/** Camera status switch that wakes a dormant device */
export const CLOSE_DORMANT = "closeDormant";

/** Result codes meaning the access token is no longer valid */
export const TOKEN_EXPIRED_CODES: ReadonlySet<string> = new Set(["TK1002"]);

/** Result codes meaning the app id / app secret pair was rejected */
export const NOT_AUTHORIZED_CODES: ReadonlySet<string> = new Set(["OP1009", "SN1001", "SN1004", "TK1001"]);

export function isOnlineStatusCode(value: unknown): value is OnlineStatusCode {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(ONLINE_STATUS, value);
}
