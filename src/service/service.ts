// A named, validated, version-gated binding to one provider instance.
//
// The service owns the provider and a private pipe channel. Calls are
// checked in front of the provider (structure, then version, per the table
// in policies.ts) and only then delegated over the pipe.

import type { FastifyBaseLogger } from 'fastify';

import { loadProtocol } from '../protocol/definition.js';
import type { ProtocolDefinition } from '../protocol/definition.js';
import {
  SupportedVersionsReplySchema,
  describeProtocolError,
  formatVersion,
  readVersion,
  versionsEqual,
} from '../protocol/messages.js';
import type { Version } from '../protocol/messages.js';
import type { ProtocolMethodName } from '../protocol/methods.js';
import { generalErrorReply, resultReply } from '../protocol/replies.js';
import type { StorageProvider } from '../providers/types.js';
import { PipeChannel } from '../transport/pipe-channel.js';
import { PipeClient } from '../transport/pipe-client.js';
import { raceSignal } from '../utils/abort.js';
import { deferred } from '../utils/deferred.js';
import { errorCode } from '../errors/index.js';
import { ServiceAlreadyStartedError, ServiceNotRunningError, VersionQueryError } from './errors.js';
import { policyFor, runChecks } from './policies.js';

export type ServiceState = 'unstarted' | 'running' | 'stopping' | 'stopped';

export interface ServiceOptions {
  name: string;
  type: string;
  provider: StorageProvider;
  logger: FastifyBaseLogger;
  protocol?: ProtocolDefinition;
}

export interface ServiceStatus {
  name: string;
  type: string;
  state: ServiceState;
  /** Null until the provider has been asked */
  supportedVersions: Version[] | null;
  inflight: number;
}

export class Service {
  readonly name: string;
  readonly type: string;
  private readonly provider: StorageProvider;
  private readonly channel: PipeChannel;
  private readonly protocol: ProtocolDefinition;
  private readonly logger: FastifyBaseLogger;
  private readonly lifetime = new AbortController();
  private readonly inflight = new Set<Promise<object>>();
  private readonly done = deferred();
  private state: ServiceState = 'unstarted';
  private client: PipeClient | undefined;
  private connecting: Promise<PipeClient> | undefined;
  private versions: Promise<Version[]> | undefined;
  private cachedVersions: Version[] | null = null;

  constructor(options: ServiceOptions) {
    this.name = options.name;
    this.type = options.type;
    this.provider = options.provider;
    this.protocol = options.protocol ?? loadProtocol();
    this.logger = options.logger.child({ service: options.name });
    this.channel = new PipeChannel(options.name);
  }

  get running(): boolean {
    return this.state === 'running';
  }

  status(): ServiceStatus {
    return {
      name: this.name,
      type: this.type,
      state: this.state,
      supportedVersions: this.cachedVersions,
      inflight: this.inflight.size,
    };
  }

  /**
   * Start the provider on the private channel. Resolves when the provider
   * has stopped serving; rejects if it fails.
   */
  async serve(): Promise<void> {
    if (this.state !== 'unstarted') {
      throw new ServiceAlreadyStartedError(this.name);
    }
    this.state = 'running';
    this.logger.info({ type: this.type }, 'Service starting');

    try {
      await this.provider.serve(this.channel, { logger: this.logger });
    } finally {
      this.finish();
    }
  }

  /** Stop now: in-flight delegated calls are aborted. */
  stop(): void {
    if (this.state === 'stopped') return;
    this.logger.info('Service stopping');
    this.state = 'stopping';
    this.lifetime.abort();
    this.provider.stop();
    this.finish();
  }

  /** Refuse new calls, wait for in-flight ones, then stop the provider. */
  async gracefulStop(): Promise<void> {
    if (this.state === 'stopped') return;
    if (this.state === 'stopping') return this.done.promise;

    this.logger.info({ inflight: this.inflight.size }, 'Service draining');
    this.state = 'stopping';
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight]);
    }
    await this.provider.gracefulStop();
    this.finish();
  }

  /**
   * Run one protocol call. Domain errors resolve as error replies;
   * infrastructure failures reject.
   */
  async call(method: ProtocolMethodName, request: object, signal?: AbortSignal): Promise<object> {
    if (this.state !== 'running') {
      throw new ServiceNotRunningError(this.name);
    }

    const task = this.process(method, request, signal);
    this.inflight.add(task);
    try {
      return await task;
    } finally {
      this.inflight.delete(task);
    }
  }

  private async process(
    method: ProtocolMethodName,
    request: object,
    signal: AbortSignal | undefined
  ): Promise<object> {
    if (method === 'GetSupportedVersions') {
      return this.supportedVersionsReply(signal);
    }

    const policy = policyFor(method);

    const early = runChecks(policy.beforeVersion, request);
    if (early) return early;

    const versionProblem = await this.checkVersion(request, signal);
    if (versionProblem) {
      return generalErrorReply('UNSUPPORTED_REQUEST_VERSION', versionProblem);
    }

    const late = runChecks(policy.afterVersion, request);
    if (late) return late;

    return this.delegate(method, request, signal);
  }

  /** Reason the request's version is rejected, or undefined if it is supported. */
  private async checkVersion(request: object, signal: AbortSignal | undefined): Promise<string | undefined> {
    let supported: Version[];
    try {
      supported = await this.supportedVersions(signal);
    } catch (error) {
      if (errorCode(error) === 'SERVICE_VERSION_QUERY_FAILED' && error instanceof Error) {
        return error.message;
      }
      throw error;
    }

    const version = readVersion(request);
    if (!version) {
      return 'request version is nil';
    }
    if (supported.some((candidate) => versionsEqual(candidate, version))) {
      return undefined;
    }
    return `unsupported request version: ${formatVersion(version)}`;
  }

  private async supportedVersionsReply(signal: AbortSignal | undefined): Promise<object> {
    try {
      return resultReply({ supportedVersions: await this.supportedVersions(signal) });
    } catch (error) {
      if (errorCode(error) === 'SERVICE_VERSION_QUERY_FAILED' && error instanceof Error) {
        return generalErrorReply('UNKNOWN', error.message);
      }
      throw error;
    }
  }

  /**
   * Supported versions, fetched from the provider once. Concurrent first
   * callers share the same fetch; each one stops waiting when its own
   * signal fires. A failed fetch is retried by the next caller.
   */
  private supportedVersions(signal: AbortSignal | undefined): Promise<Version[]> {
    if (!this.versions) {
      const fetching = this.fetchVersions();
      this.versions = fetching;
      fetching.then(
        (versions) => {
          this.cachedVersions = versions;
          this.logger.debug({ versions: versions.map(formatVersion) }, 'Cached supported versions');
        },
        (error: unknown) => {
          if (this.versions === fetching) this.versions = undefined;
          this.logger.warn(
            { err: error instanceof Error ? error.message : String(error) },
            'Supported version query failed'
          );
        }
      );
    }
    return raceSignal(this.versions, signal, `${this.name}: GetSupportedVersions`);
  }

  private async fetchVersions(): Promise<Version[]> {
    const reply = await this.delegate('GetSupportedVersions', {}, undefined);
    const parsed = SupportedVersionsReplySchema.safeParse(reply);
    if (!parsed.success) {
      throw new VersionQueryError(this.name, 'malformed reply');
    }
    if (parsed.data.error) {
      throw new VersionQueryError(this.name, describeProtocolError(parsed.data.error));
    }
    if (!parsed.data.result) {
      throw new VersionQueryError(this.name, 'nil result');
    }
    return parsed.data.result.supportedVersions;
  }

  private async delegate(
    method: ProtocolMethodName,
    request: object,
    signal: AbortSignal | undefined
  ): Promise<object> {
    const codec = this.protocol.method(method);
    const combined = signal ? AbortSignal.any([signal, this.lifetime.signal]) : this.lifetime.signal;

    const client = await this.connect(combined);
    const payload = await client.call(codec.path, codec.encodeRequest(request), combined);
    return codec.decodeResponse(payload);
  }

  /** One pipe connection per service, dialled on first use and redialled if it drops. */
  private connect(signal: AbortSignal): Promise<PipeClient> {
    if (this.client && !this.client.closed) {
      return Promise.resolve(this.client);
    }

    if (!this.connecting) {
      const dialing = this.channel.dial(this.lifetime.signal).then((socket) => {
        const client = new PipeClient(socket, { name: this.name, logger: this.logger });
        this.client = client;
        return client;
      });
      const reset = (): void => {
        if (this.connecting === dialing) this.connecting = undefined;
      };
      this.connecting = dialing;
      dialing.then(reset, reset);
    }

    return raceSignal(this.connecting, signal, `${this.name}: dial`);
  }

  private finish(): void {
    if (this.state === 'stopped') return;
    this.state = 'stopped';
    this.lifetime.abort();
    this.client?.close();
    this.channel.close();
    this.done.resolve();
    this.logger.info('Service stopped');
  }
}
