/** Host platforms an entity can be registered on */
export enum PlatformEnum {
  sensor = "sensor",
  button = "button",
  select = "select"
}

/** PTZ movement directions, see PTZ_OPERATIONS for the wire codes */
export enum PtzEnum {
  up = "UP",
  down = "DOWN",
  left = "LEFT",
  right = "RIGHT",
  upperLeft = "UPPER_LEFT",
  bottomLeft = "BOTTOM_LEFT",
  upperRight = "UPPER_RIGHT",
  bottomRight = "BOTTOM_RIGHT",
  zoomIn = "ZOOM_IN",
  zoomOut = "ZOOM_OUT",
  stop = "STOP"
}
