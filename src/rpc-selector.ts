import { JsonRpcProvider } from '@ethersproject/providers';
import { ProbeTransport, ProviderRecord, SelectionSnapshot, SelectorConstructorConfig } from '../types/selector';
import { NormalizedConfig, resolveConfig } from './config/resolveConfig';
import { NotReadyError } from './errors';
import { Logger, LogLevel, LogMetadata, createLogger } from './logging/logger';
import { measureRound } from './performance/measure';
import { createProvider } from './provider/createProvider';
import { createAxiosTransport } from './provider/probeTransport';
import { ReadinessGate } from './readiness/readinessGate';
import { applyRoundResult, createProviderRecords, latencyMap } from './rpc/providerRegistry';
import { RoundScheduler } from './scheduler/roundScheduler';
import { Selector } from './selection/selector';

export type LifecycleState = 'running' | 'destroyed';

/**
 * Keeps measuring a fixed set of equivalent JSON-RPC providers in the
 * background and tells callers which one currently answers fastest.
 *
 * @example
 * const selector = FastestRpcSelector.init(
 *   ['https://rpc-a.example.org', 'https://rpc-b.example.org'],
 *   10_000
 * );
 * await selector.waitUntilReady();
 * const url = selector.getFastestProvider();
 * // ...
 * selector.destroy();
 */
export class FastestRpcSelector {
  private readonly config: NormalizedConfig;
  private readonly records: ProviderRecord[];
  private readonly selector = new Selector();
  private readonly gate = new ReadinessGate();
  private readonly scheduler: RoundScheduler;
  private readonly transport: ProbeTransport;
  private readonly clock: () => number;
  private readonly logger: Logger;
  private state: LifecycleState = 'running';
  private provider: JsonRpcProvider | null = null;

  private constructor(urls: readonly string[], intervalMs: number, opts: SelectorConstructorConfig) {
    this.config = resolveConfig(urls, intervalMs, opts);
    this.logger = opts.logger ?? createLogger(this.config.settings.logLevel);
    this.transport = opts.transport ?? createAxiosTransport(this.config.probe);
    this.clock = opts.clock ?? (() => performance.now());
    this.records = createProviderRecords(this.config.urls);
    this.scheduler = new RoundScheduler((signal) => this._runRound(signal), {
      intervalMs: this.config.intervalMs,
      clock: this.clock,
      logger: this.logger,
    });
  }

  /**
   * Validates the provider list and starts measuring. Returns before the
   * first round completes; use `waitUntilReady` to wait for it.
   *
   * @param urls Provider URLs, all serving the same network
   * @param intervalMs Delay between measurement rounds
   * @throws ConfigurationError when `urls` is empty or a setting is out of range
   */
  static init(urls: readonly string[], intervalMs: number, opts: SelectorConstructorConfig = {}): FastestRpcSelector {
    const handle = new FastestRpcSelector(urls, intervalMs, opts);
    handle._log('info', 'Starting provider latency checks', {
      providers: handle.config.urls.length,
      intervalMs: handle.config.intervalMs,
      probeTimeoutMs: handle.config.probeTimeoutMs,
    });
    handle.scheduler.start();
    return handle;
  }

  isReady(): boolean {
    return this.gate.isReady();
  }

  /**
   * Resolves once the first round has completed, whether or not any provider answered.
   * Rejects with `NotReadyError` if the selector is destroyed first.
   */
  waitUntilReady(): Promise<void> {
    return this.gate.wait();
  }

  /**
   * @throws NotReadyError if no round has produced a successful probe yet
   */
  getFastestProvider(): string {
    const { fastestUrl } = this.selector.current();
    if (fastestUrl === undefined) throw new NotReadyError();
    return fastestUrl;
  }

  /**
   * Helpful for consumers using ethers directly. The provider is reused
   * until a different URL becomes the fastest.
   */
  getFastestRpcProvider(): JsonRpcProvider {
    const url = this.getFastestProvider();
    if (!this.provider || this.provider.connection.url !== url) {
      this.provider = createProvider(url, this.config.settings.chainId);
    }
    return this.provider;
  }

  getSnapshot(): SelectionSnapshot {
    return { ...this.selector.current() };
  }

  getProviders(): ProviderRecord[] {
    return this.records.map((record) => ({ ...record }));
  }

  getLatencies(): Record<string, number> {
    return latencyMap(this.records);
  }

  isDestroyed(): boolean {
    return this.state === 'destroyed';
  }

  /**
   * Stops measuring and abandons any probe still in flight. The last
   * selection stays readable. Calling it again does nothing.
   */
  destroy(): void {
    if (this.state === 'destroyed') return;
    this.state = 'destroyed';
    this.scheduler.stop();
    this.gate.cancel(new NotReadyError('Selector was destroyed before the first round completed'));
    this._log('info', 'Stopped provider latency checks', { generation: this.selector.current().generation });
  }

  private async _runRound(signal: AbortSignal): Promise<void> {
    const round = await measureRound(this.config.urls, {
      timeout: this.config.probeTimeoutMs,
      transport: this.transport,
      clock: this.clock,
      signal,
    });
    // Destroyed while probing: drop the late results
    if (signal.aborted) return;

    for (const failure of applyRoundResult(this.records, round)) {
      this._log('warn', 'Provider probe failed', {
        url: failure.url,
        kind: failure.kind,
        consecutiveFailures: failure.consecutiveFailures,
        error: failure.message,
      });
    }

    const previous = this.selector.current();
    const next = this.selector.publish(round);
    if (next === previous) {
      this._log('error', 'All providers failed, keeping previous selection', {
        round: this.scheduler.roundCount,
        fastestUrl: previous.fastestUrl,
      });
    } else {
      this._log('ok', 'Selected fastest provider', {
        url: next.fastestUrl,
        latencyMs: next.latencyMs,
        generation: next.generation,
      });
    }
    this.gate.open();
  }

  private _log(level: LogLevel, message: string, metadata?: LogMetadata) {
    this.logger.log(level, message, metadata);
  }
}
