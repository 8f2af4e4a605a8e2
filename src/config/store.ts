import type { GatewayConfig } from './types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config-store');

export type ConfigLoader = () => GatewayConfig;
export type ConfigListener = (config: GatewayConfig) => void;

/**
 * Holds the active configuration snapshot. A reload builds a complete new
 * snapshot first and swaps it in one assignment; a failed reload keeps the
 * previous snapshot.
 */
export class ConfigStore {
  private snapshot: Readonly<GatewayConfig>;
  private listeners: ConfigListener[] = [];
  private reloadTimer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly loader: ConfigLoader,
    initial?: GatewayConfig,
  ) {
    this.snapshot = Object.freeze(initial ?? loader());
  }

  get current(): Readonly<GatewayConfig> {
    return this.snapshot;
  }

  onReload(listener: ConfigListener): void {
    this.listeners.push(listener);
  }

  reload(): boolean {
    let next: GatewayConfig;
    try {
      next = this.loader();
    } catch (err) {
      log.error('Failed to reload configuration, keeping previous snapshot', err);
      return false;
    }
    const previous = this.snapshot;
    this.snapshot = Object.freeze(next);
    try {
      for (const listener of this.listeners) {
        listener(this.snapshot);
      }
    } catch (err) {
      log.error('Configuration listener rejected reload, restoring previous snapshot', err);
      this.snapshot = previous;
      return false;
    }
    log.info(`Configuration reloaded (${next.policies.length} policies)`);
    return true;
  }

  /**
   * Periodically reload in the background. The timer is unref'd so it never
   * keeps the process alive on its own.
   */
  startAutoReload(intervalMs = 30_000): void {
    if (this.reloadTimer) return;
    this.reloadTimer = setInterval(() => {
      this.reload();
    }, intervalMs);
    this.reloadTimer.unref();
    log.info(`Configuration hot reload enabled (every ${intervalMs}ms)`);
  }

  stopAutoReload(): void {
    if (this.reloadTimer) {
      clearInterval(this.reloadTimer);
      this.reloadTimer = null;
    }
  }
}
