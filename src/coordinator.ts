import type { ImouCamChannel } from "./channel/channel";
import { DEFAULT_SCAN_INTERVAL } from "./constants";
import { ImouError, InvalidConfigurationError } from "./exceptions";
import { createLogger, ImouLogger } from "./logger";

type UpdateListener = (coordinator: ImouDataUpdateCoordinator) => void;

/**
 * Polls a channel on a fixed interval.
 *
 * A failed cycle is recorded in `lastUpdateSuccess` / `lastError` and the next
 * cycle is still scheduled. Cycles never overlap: the next one is scheduled
 * once the previous one has finished.
 */
export class ImouDataUpdateCoordinator {
  readonly channel: ImouCamChannel;
  readonly scanInterval: number;

  private readonly log: ImouLogger;
  private readonly listeners: Set<UpdateListener> = new Set();
  private timer: NodeJS.Timeout | null = null;
  private running: boolean = false;

  public lastUpdateSuccess: boolean = false;
  public lastError: ImouError | null = null;
  public data: boolean | null = null;

  constructor(channel: ImouCamChannel, scanInterval: number = DEFAULT_SCAN_INTERVAL, logger?: ImouLogger) {
    if (!(scanInterval > 0)) {
      throw new InvalidConfigurationError(`scan interval ${scanInterval} must be a positive number`);
    }
    this.channel = channel;
    this.scanInterval = scanInterval;
    this.log = logger ?? createLogger("coordinator");
    this.log.debug(`Initialized coordinator. Scan interval ${scanInterval} seconds`);
  }

  /**
   * Run one polling cycle: refresh the channel, then every enabled entity.
   * Domain errors are recorded rather than thrown.
   */
  async refresh(): Promise<void> {
    try {
      this.data = await this.channel.getData();
      this.lastUpdateSuccess = true;
      this.lastError = null;
    } catch (err) {
      if (!(err instanceof ImouError)) {
        throw err;
      }
      this.log.error(err.toString());
      this.lastUpdateSuccess = false;
      this.lastError = err;
    }

    if (this.lastUpdateSuccess && this.data === true) {
      await this.updateEntities();
    }

    for (const listener of this.listeners) {
      listener(this);
    }
  }

  // A failing entity only loses its own freshness.
  private async updateEntities(): Promise<void> {
    for (const entity of this.channel.getAllSensors()) {
      if (!entity.isEnabled()) {
        continue;
      }
      try {
        await entity.update();
      } catch (err) {
        if (!(err instanceof ImouError)) {
          throw err;
        }
        this.log.warn(`[${this.channel.getName()}] failed to update ${entity.getDescription()}: ${err.toString()}`);
      }
    }
  }

  /**
   * Register a callback run after every cycle. Returns a function removing it.
   */
  addListener(listener: UpdateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Start polling. The first cycle runs after one interval.
   */
  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.schedule();
  }

  stop(): void {
    this.running = false;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private schedule(): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.refresh()
        .catch(err => {
          this.log.error(`Unexpected error while polling ${this.channel.getName()}: ${err}`);
          this.lastUpdateSuccess = false;
        })
        .finally(() => {
          if (this.running) {
            this.schedule();
          }
        });
    }, this.scanInterval * 1000);
  }
}
