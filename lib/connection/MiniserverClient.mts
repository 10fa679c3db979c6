/**
 * Miniserver Client - Facade
 *
 * This is the main entry point for Miniserver communication.
 * It orchestrates the session, token, structure, channel and state modules
 * and provides the public API consumed by platform integrations.
 */

import {
  CLIENT_CONFIG,
  ENDPOINTS,
  ERROR_CODES,
  MiniserverError,
  PROTOCOL_CONFIG,
  TransportError,
  isSuccessEnvelope,
  envelopeCode,
  parseEnvelope,
  parseJson,
} from '../MiniserverProtocol.mjs';
import { Authenticator } from './Authenticator.mjs';
import { ConnectionManager } from './ConnectionManager.mjs';
import { HttpSession } from './HttpSession.mjs';
import { ControlRegistry } from '../structure/ControlRegistry.mjs';
import { StructureLoader } from '../structure/StructureLoader.mjs';
import { StateManager } from '../state/StateManager.mjs';
import { MessageHandler } from '../messaging/MessageHandler.mjs';
import {
  buildCommandPath,
  buildStatePath,
  resolveAddress,
  toRequestPath,
  type CommandValue,
} from '../messaging/Commands.mjs';
import { createLogger } from '../utils/Logger.mjs';
import type {
  ClientConfig,
  Control,
  ConnectionState,
  HttpResponse,
  Logger,
  ResolvedClientConfig,
  StateCallback,
  TokenInfo,
  UnsubscribeFunction,
} from '../types.mjs';

/**
 * Apply defaults to a client config
 */
export function resolveConfig(config: ClientConfig): ResolvedClientConfig {
  const useTls = config.useTls ?? true;
  return {
    host: config.host,
    username: config.username,
    password: config.password,
    port: config.port ?? (useTls ? CLIENT_CONFIG.DEFAULT_TLS_PORT : CLIENT_CONFIG.DEFAULT_PORT),
    useTls,
    verifySsl: config.verifySsl ?? true,
    dispatcher: config.dispatcher,
    permission: config.permission ?? CLIENT_CONFIG.PERMISSION_WEB,
    clientInfo: config.clientInfo ?? CLIENT_CONFIG.INFO,
    reconnectDelay: config.reconnectDelay ?? PROTOCOL_CONFIG.TIMEOUTS.RECONNECT_DELAY,
    heartbeatInterval: config.heartbeatInterval ?? PROTOCOL_CONFIG.TIMEOUTS.HEARTBEAT,
    logger: config.logger,
    verbose: config.verbose ?? false,
  };
}

// ============================================================================
// MiniserverClient Class
// ============================================================================

export class MiniserverClient {
  private readonly config: ResolvedClientConfig;
  private readonly logger: Logger;

  // Modules
  private session: HttpSession | null = null;
  private readonly authenticator: Authenticator;
  private readonly structureLoader: StructureLoader;
  private readonly connectionManager: ConnectionManager;
  private readonly registry = new ControlRegistry();
  private readonly stateManager: StateManager;
  private readonly messageHandler: MessageHandler;

  // Lifecycle
  private started: boolean = false;
  private closing: boolean = false;
  private startPromise: Promise<ReadonlyMap<string, Control>> | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private reconnectAttempt: Promise<void> | null = null;

  constructor(config: ClientConfig) {
    this.config = resolveConfig(config);

    const scoped = (scope: string): Logger =>
      createLogger(scope, { verbose: this.config.verbose, sink: this.config.logger });
    this.logger = scoped('MiniserverClient');

    const httpGet = (path: string, headers?: Record<string, string>): Promise<HttpResponse> =>
      this.requireSession().get(path, headers);

    this.authenticator = new Authenticator(
      { username: this.config.username, password: this.config.password },
      { permission: this.config.permission, info: this.config.clientInfo },
      httpGet,
      scoped('Authenticator')
    );
    this.structureLoader = new StructureLoader(httpGet, scoped('StructureLoader'));
    this.connectionManager = new ConnectionManager({
      verifySsl: this.config.verifySsl,
      heartbeatInterval: this.config.heartbeatInterval,
      logger: scoped('ConnectionManager'),
    });
    this.stateManager = new StateManager(scoped('StateManager'));
    this.messageHandler = new MessageHandler(
      this.registry,
      this.stateManager,
      scoped('MessageHandler')
    );

    this.setupCallbacks();
  }

  private setupCallbacks(): void {
    this.connectionManager.setOnStateChange((state) => {
      this.logger.debug(`Channel ${state}`);
    });

    this.connectionManager.setOnFrame((data, isBinary) => {
      this.messageHandler.processFrame(data, isBinary);
    });

    this.connectionManager.setOnClose((code, reason, shouldReconnect) => {
      if (!shouldReconnect || this.closing) return;
      this.logger.warn(`Channel closed unexpectedly (${code}: ${reason})`);
      this.scheduleReconnect();
    });
  }

  // ===========================================================================
  // Public API - Lifecycle
  // ===========================================================================

  get baseUrl(): string {
    const scheme = this.config.useTls ? 'https' : 'http';
    return `${scheme}://${this.config.host}:${this.config.port}`;
  }

  /**
   * Authenticate, load the structure and open the streaming channel.
   * Returns the control registry; once started, later calls return it
   * without refetching.
   */
  async start(): Promise<ReadonlyMap<string, Control>> {
    if (this.started) {
      this.logger.debug('Already started, returning cached registry');
      return this.registry.asMap();
    }

    if (!this.startPromise) {
      this.startPromise = this.doStart().finally(() => {
        this.startPromise = null;
      });
    }
    return this.startPromise;
  }

  private async doStart(): Promise<ReadonlyMap<string, Control>> {
    this.closing = false;
    this.ensureSession();

    this.logger.info(`Connecting to Miniserver at ${this.baseUrl}`);
    await this.authenticator.ensureToken();
    await this.loadStructure();
    await this.openChannel();

    this.started = true;
    this.logger.info(`Started with ${this.registry.size} controls`);
    return this.registry.asMap();
  }

  /**
   * Cancel reconnects, close the channel and the owned HTTP session,
   * and drop cached state. Safe to call more than once.
   */
  async stop(): Promise<void> {
    this.closing = true;

    if (this.startPromise) {
      await this.startPromise.catch((error: unknown) => {
        this.logger.debug('Start interrupted by stop:', error);
      });
    }

    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }

    await this.connectionManager.close();
    if (this.reconnectAttempt) {
      await this.reconnectAttempt;
    }
    await this.connectionManager.close();

    if (this.session) {
      await this.session.close();
      this.session = null;
    }

    this.stateManager.clear();
    this.authenticator.reset();
    this.started = false;
  }

  get isStarted(): boolean {
    return this.started;
  }

  get isConnected(): boolean {
    return this.connectionManager.isConnected();
  }

  get connectionState(): ConnectionState {
    return this.connectionManager.getState();
  }

  get token(): TokenInfo | null {
    return this.authenticator.getToken();
  }

  // ===========================================================================
  // Public API - Controls & State
  // ===========================================================================

  get controls(): ReadonlyMap<string, Control> {
    return this.registry.asMap();
  }

  getControl(uuid: string): Control | undefined {
    return this.registry.get(uuid);
  }

  /**
   * Cached value of a control (or one of its named states)
   */
  getState(uuid: string, state: string = ''): unknown {
    return this.stateManager.getValue(uuid, state);
  }

  /**
   * Subscribe to state events; listeners run in registration order
   */
  registerCallback(callback: StateCallback): UnsubscribeFunction {
    return this.stateManager.addListener(callback);
  }

  /**
   * Send a command to a control, then refresh its state.
   *
   * A non-success status is logged, not raised.
   * @throws TransportError when the request cannot be sent
   */
  async sendCommand(uuid: string, command: string, value?: CommandValue | null): Promise<void> {
    if (!this.session) {
      throw new MiniserverError(ERROR_CODES.NOT_STARTED);
    }

    const address = resolveAddress(uuid, this.registry.get(uuid));
    const path = buildCommandPath(address, command, value);

    let response: HttpResponse;
    try {
      response = await this.authorizedGet(toRequestPath(path));
    } catch (error) {
      this.logger.error(`Failed to send ${path}:`, error instanceof Error ? error.message : error);
      throw error instanceof MiniserverError
        ? error
        : new TransportError(`Failed to send ${path}`, error);
    }

    if (!this.isCommandAccepted(path, response)) {
      return;
    }

    await this.updateState(uuid);
  }

  /**
   * Read a control's current value, cache it and notify listeners.
   * On failure the previously cached value is returned.
   */
  async updateState(uuid: string): Promise<unknown> {
    const address = resolveAddress(uuid, this.registry.get(uuid));
    const path = buildStatePath(address);

    try {
      const response = await this.authorizedGet(toRequestPath(path));
      if (response.status !== 200) {
        throw new TransportError(`HTTP ${response.status}`, { status: response.status });
      }

      const payload = parseJson(response.body);
      const envelope = parseEnvelope(payload);
      const value = envelope && 'value' in envelope.LL ? envelope.LL.value : payload;

      this.stateManager.apply({ controlUuid: uuid, state: '', value });
      return value;
    } catch (error) {
      this.logger.warn(
        `Unable to refresh state for control ${uuid}: ${error instanceof Error ? error.message : String(error)}`
      );
      return this.stateManager.getValue(uuid);
    }
  }

  /**
   * Re-download the structure document and rebuild the registry
   */
  async loadStructure(): Promise<ReadonlyMap<string, Control>> {
    await this.authenticator.ensureToken();
    const controls = await this.structureLoader.load(this.authenticator.authorizationHeader());
    const duplicates = this.registry.replace(controls);

    for (const uuid of duplicates) {
      this.logger.warn(`Duplicate control uuid ${uuid} ignored`);
    }
    return this.registry.asMap();
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private ensureSession(): HttpSession {
    if (!this.session) {
      this.session = new HttpSession({
        baseUrl: this.baseUrl,
        verifySsl: this.config.verifySsl,
        dispatcher: this.config.dispatcher,
        logger: createLogger('HttpSession', {
          verbose: this.config.verbose,
          sink: this.config.logger,
        }),
      });
    }
    return this.session;
  }

  private requireSession(): HttpSession {
    if (!this.session) {
      throw new MiniserverError(ERROR_CODES.NOT_STARTED);
    }
    return this.session;
  }

  private async authorizedGet(path: string): Promise<HttpResponse> {
    await this.authenticator.ensureToken();
    return this.requireSession().get(path, this.authenticator.authorizationHeader());
  }

  private isCommandAccepted(path: string, response: HttpResponse): boolean {
    if (response.status !== 200) {
      this.logger.warn(`Command ${path} failed with HTTP ${response.status}`);
      return false;
    }

    let code: string | undefined;
    try {
      const envelope = parseEnvelope(parseJson(response.body));
      code = envelope ? envelopeCode(envelope) : undefined;
      if (envelope && isSuccessEnvelope(envelope)) {
        return true;
      }
    } catch (error) {
      this.logger.warn(
        `Command ${path} returned an unreadable response: ${error instanceof Error ? error.message : String(error)}`
      );
      return false;
    }

    this.logger.warn(`Command ${path} returned code ${code ?? 'none'}`);
    return false;
  }

  private buildStreamUrl(token: TokenInfo): string {
    const scheme = this.config.useTls ? 'wss' : 'ws';
    const auth = encodeURIComponent(token.token);
    return `${scheme}://${this.config.host}:${this.config.port}${ENDPOINTS.WEBSOCKET}?auth=${auth}`;
  }

  private async openChannel(): Promise<void> {
    const token = await this.authenticator.ensureToken();
    if (this.closing) {
      throw new TransportError('Client is stopping');
    }
    await this.connectionManager.open(this.buildStreamUrl(token));
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer || this.closing) return;

    this.logger.info(`Reconnecting in ${this.config.reconnectDelay} ms`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.reconnectAttempt = this.reconnect().finally(() => {
        this.reconnectAttempt = null;
      });
    }, this.config.reconnectDelay);
  }

  private async reconnect(): Promise<void> {
    if (this.closing) return;

    try {
      await this.openChannel();
      this.logger.info('Streaming channel re-established');
    } catch (error) {
      if (this.closing) return;
      this.logger.warn(
        `Reconnect failed: ${error instanceof Error ? error.message : String(error)}`
      );
      this.scheduleReconnect();
    }
  }
}
