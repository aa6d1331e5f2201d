import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import http from 'http';
import https from 'https';
import type { CalTopoSettings, RetrySettings } from './config.js';
import { InvalidDestinationError, errorMessage } from './errors.js';
import { createLogger, sanitizeForLog } from './log.js';
import { abortableSleep, type Sleep } from './timers.js';

const log = createLogger('dispatcher');

const IDENTIFIER_RE = /^[a-zA-Z0-9_]+$/;
const REDACTED = '<REDACTED>';
export const MIN_REDACTED_LENGTH = 4;
const PROBE_CALLSIGN = 'GATEWAY_SYSTEM_TEST';

export type DestinationKind = 'connect_key' | 'group';

export interface Destination {
  readonly kind: DestinationKind;
  readonly identifier: string;
  /** Safe to log. */
  readonly label: string;
}

export interface DispatcherOptions {
  /** Shared client owned by the caller; survives `close()`. */
  client?: AxiosInstance;
  /** Aborts in-flight requests and backoff waits. */
  signal?: AbortSignal;
  sleep?: Sleep;
  random?: () => number;
}

export type AttemptOutcome = 'success' | 'fatal' | 'retry';

/** `*` matches any run of characters; everything else is literal. */
export function matchesUrlPattern(url: string, pattern: string): boolean {
  const re = pattern.split('*').map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&')).join('.*');
  return new RegExp(`^${re}$`).test(url);
}

/**
 * Explicit patterns when configured; otherwise only caltopo.com and its
 * subdomains over http(s).
 */
export function validateBaseUrl(url: string, allowedPatterns: string[]): void {
  if (allowedPatterns.length) {
    if (!allowedPatterns.some((p) => matchesUrlPattern(url, p))) {
      throw new InvalidDestinationError(`base URL ${url} does not match any allowed pattern: ${allowedPatterns.join(', ')}`);
    }
    return;
  }
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new InvalidDestinationError(`base URL ${url} is not a valid URL`);
  }
  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
    throw new InvalidDestinationError(`base URL ${url} must use http or https`);
  }
  const host = parsed.hostname.toLowerCase();
  if (host !== 'caltopo.com' && !host.endsWith('.caltopo.com')) {
    throw new InvalidDestinationError(`base URL ${url}: hostname must be 'caltopo.com' or a subdomain thereof`);
  }
}

export function validateIdentifier(identifier: string, kind: DestinationKind): void {
  if (!IDENTIFIER_RE.test(identifier)) {
    throw new InvalidDestinationError(`invalid ${kind}: only letters, digits and underscore are allowed (length ${identifier.length})`);
  }
}

/**
 * Replace the path segment after `baseUrl` with a placeholder, and any other
 * occurrence of a listed secret that is at least MIN_REDACTED_LENGTH long.
 */
export function redactSecrets(text: string, baseUrl: string, secrets: Array<string | undefined>): string {
  const escaped = baseUrl.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  let out = text.replace(new RegExp(`(${escaped}/)[^?\\s]+`, 'g'), `$1${REDACTED}`);
  for (const s of secrets) {
    if (s && s.length >= MIN_REDACTED_LENGTH) out = out.split(s).join(REDACTED);
  }
  return out;
}

export function classifyStatus(status: number): AttemptOutcome {
  if (status >= 200 && status < 300) return 'success';
  if (status === 429 || status >= 500) return 'retry';
  return 'fatal';
}

/** Delay before retry number `attempt + 1` (attempt is zero-based). */
export function backoffDelay(attempt: number, retry: RetrySettings, random: () => number = Math.random): number {
  return Math.min(retry.maxDelayMs, retry.baseDelayMs * 2 ** attempt) + random() * retry.jitterMs;
}

export function buildReportUrl(baseUrl: string, identifier: string, callsign: string, latitude: number, longitude: number): string {
  const query = new URLSearchParams({ id: callsign, lat: String(latitude), lng: String(longitude) });
  return `${baseUrl}/${identifier}?${query.toString()}`;
}

/**
 * Delivers position reports to the configured CalTopo endpoints (connect key
 * and/or group). Destinations are sent to concurrently and fail independently.
 */
export class ReportDispatcher {
  private readonly settings: CalTopoSettings;
  private readonly signal: AbortSignal | undefined;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private client: AxiosInstance | null;
  private ownsClient: boolean;
  private agents: { http: http.Agent; https: https.Agent } | null = null;

  constructor(settings: CalTopoSettings, options: DispatcherOptions = {}) {
    this.settings = settings;
    this.signal = options.signal;
    this.sleep = options.sleep ?? abortableSleep;
    this.random = options.random ?? Math.random;
    this.client = options.client ?? null;
    this.ownsClient = false;
  }

  /** Create the keep-alive client unless one was supplied. */
  async start(): Promise<void> {
    if (this.client) return;
    this.agents = {
      http: new http.Agent({ keepAlive: true }),
      https: new https.Agent({ keepAlive: true }),
    };
    const axiosConfig: AxiosRequestConfig = {
      timeout: this.settings.timeoutMs,
      httpAgent: this.agents.http,
      httpsAgent: this.agents.https,
      maxRedirects: 0,
      validateStatus: () => true,
    };
    this.client = axios.create(axiosConfig);
    this.ownsClient = true;
  }

  destinations(groupOverride?: string): Destination[] {
    const out: Destination[] = [];
    if (this.settings.connectKey) {
      out.push({ kind: 'connect_key', identifier: this.settings.connectKey, label: 'connect key' });
    }
    if (this.settings.group) {
      const override = groupOverride && groupOverride !== this.settings.group ? groupOverride : undefined;
      out.push({ kind: 'group', identifier: override ?? this.settings.group, label: override ? 'group override' : 'group' });
    }
    return out;
  }

  /** True if at least one destination accepted the update. */
  async sendPositionUpdate(callsign: string, latitude: number, longitude: number, groupOverride?: string): Promise<boolean> {
    const client = await this.ensureClient();
    const targets = this.destinations(groupOverride);
    if (!targets.length) return false;

    const results = await Promise.allSettled(
      targets.map((d) => this.sendTo(client, d, callsign, latitude, longitude))
    );
    return results.some((r) => r.status === 'fulfilled' && r.value);
  }

  /** Probe every destination; any HTTP response counts as reachable. */
  async testConnection(): Promise<boolean> {
    const client = await this.ensureClient();
    const targets = this.destinations();
    if (!targets.length) return false;

    const results = await Promise.allSettled(targets.map((d) => this.probe(client, d)));
    const ok = results.filter((r) => r.status === 'fulfilled' && r.value).length;
    if (ok > 0) {
      log.info(`CalTopo API connectivity test successful (${ok}/${targets.length} endpoints)`);
      return true;
    }
    log.error('CalTopo API connectivity test failed for all endpoints');
    return false;
  }

  async close(): Promise<void> {
    if (this.ownsClient && this.agents) {
      this.agents.http.destroy();
      this.agents.https.destroy();
    }
    this.agents = null;
    if (this.ownsClient) {
      this.client = null;
      this.ownsClient = false;
    }
  }

  private async ensureClient(): Promise<AxiosInstance> {
    if (!this.client) await this.start();
    if (!this.client) throw new Error('HTTP client failed to initialize');
    return this.client;
  }

  private scrub(text: string, destination?: Destination): string {
    return sanitizeForLog(
      redactSecrets(text, this.settings.baseUrl, [this.settings.connectKey, this.settings.group, destination?.identifier])
    );
  }

  private checkDestination(destination: Destination): boolean {
    try {
      validateIdentifier(destination.identifier, destination.kind);
      validateBaseUrl(this.settings.baseUrl, this.settings.allowedUrlPatterns);
      return true;
    } catch (e) {
      log.error(`refusing to send to ${destination.kind}: ${this.scrub(errorMessage(e), destination)}`);
      return false;
    }
  }

  private async sendTo(client: AxiosInstance, destination: Destination, callsign: string, latitude: number, longitude: number): Promise<boolean> {
    if (!this.checkDestination(destination)) return false;

    const url = buildReportUrl(this.settings.baseUrl, destination.identifier, callsign, latitude, longitude);
    const who = `${sanitizeForLog(callsign)} (${destination.label})`;
    const { maxAttempts } = this.settings.retry;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      if (this.signal?.aborted) return false;
      log.debug(`sending position update for ${who} (attempt ${attempt + 1}): ${this.scrub(url, destination)}`);
      try {
        const res = await client.get(url, {
          signal: this.signal,
          timeout: this.settings.timeoutMs,
          maxRedirects: 0,
          validateStatus: () => true,
        });
        const outcome = classifyStatus(res.status);
        if (outcome === 'success') {
          log.info(`sent position update for ${who}`);
          return true;
        }
        const body = typeof res.data === 'string' ? res.data.slice(0, 200) : '';
        if (outcome === 'fatal') {
          log.error(`CalTopo API error for ${who}: HTTP ${res.status} ${this.scrub(body, destination)}`);
          return false;
        }
        log.warn(`CalTopo API error for ${who}: HTTP ${res.status} ${this.scrub(body, destination)}; will retry`);
      } catch (e) {
        if (axios.isCancel(e) || this.signal?.aborted) {
          log.info(`position update for ${who} cancelled`);
          return false;
        }
        if (axios.isAxiosError(e) && !e.response) {
          log.warn(`CalTopo connection/timeout error for ${who}: ${this.scrub(e.message, destination)}; will retry`);
        } else {
          log.error(`unexpected error sending position update for ${who}: ${this.scrub(errorMessage(e), destination)}`);
          return false;
        }
      }

      if (attempt < maxAttempts - 1) {
        const delay = backoffDelay(attempt, this.settings.retry, this.random);
        log.debug(`retrying ${who} in ${(delay / 1000).toFixed(2)}s`);
        try {
          await this.sleep(delay, this.signal);
        } catch {
          log.info(`position update for ${who} cancelled during backoff`);
          return false;
        }
      }
    }

    log.error(`failed to send position update for ${who} after ${maxAttempts} attempts`);
    return false;
  }

  private async probe(client: AxiosInstance, destination: Destination): Promise<boolean> {
    if (!this.checkDestination(destination)) return false;
    const url = buildReportUrl(this.settings.baseUrl, destination.identifier, PROBE_CALLSIGN, 0, 0);
    try {
      const res = await client.get(url, {
        signal: this.signal,
        timeout: this.settings.timeoutMs,
        maxRedirects: 0,
        validateStatus: () => true,
      });
      log.info(`CalTopo ${destination.label} endpoint reachable (HTTP ${res.status})`);
      return true;
    } catch (e) {
      log.error(`CalTopo ${destination.label} endpoint test failed: ${this.scrub(errorMessage(e), destination)}`);
      return false;
    }
  }
}
