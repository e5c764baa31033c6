import { Watch } from "@kubernetes/client-node";
import { Logger } from "../helpers/logger";

export interface WatchQuery {
  labelSelector?: string;
  fieldSelector?: string;
}

/**
 * Wrapper around a watch call to retry on failures
 */
export class Watcher<T> {

  private readonly logger = new Logger("watcher");
  private startedWatch = false;
  private stopped = false;
  private retryTimer?: NodeJS.Timeout;
  private callbacks: Array<Callback<T>> = [];

  constructor(private watchClient: Pick<Watch, "watch">, private path: string, private query: WatchQuery, private retryDelay: number) {

  }

  public subscribe(callback: Callback<T>): void {
    this.callbacks.push(callback);

    // Start watching when first subscriber is registered
    if (!this.startedWatch) {
      this.startWatch();
      this.startedWatch = true;
    }
  }

  /**
   * No restarts after this, the running request ends with the process
   */
  public stop(): void {
    this.stopped = true;
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = undefined;
    }
  }

  private startWatch() {
    if (this.stopped) {
      return;
    }
    this.watchClient.watch(this.path, {
      ...this.query
    }, (type, obj) => {
      // On event received, call callbacks
      this.callbacks.forEach(callback => {
        callback(type, obj).catch(e => this.logger.error(e));
      });

    }, e => {
      // Handle error when watch is interupted
      this.logger.warn(`Watch ended for ${this.path}, retrying in a few seconds...`, e);
      this.scheduleRestart();
    }).catch(e => {
      // Handle error when api call to kubernetes failes
      this.logger.error(`Failed to start watch on ${this.path}, retrying in a few seconds...`, e);
      this.scheduleRestart();
    });
  }

  private scheduleRestart() {
    if (this.stopped) {
      return;
    }
    this.retryTimer = setTimeout(() => {
      this.retryTimer = undefined;
      this.startWatch();
    }, this.retryDelay);
  }

}

export type Callback<T> = (type: string, obj: T) => Promise<void>;
