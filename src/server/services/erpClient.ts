// =============================================================================
// ERP Client — JSON-RPC RemoteClient for the ERP's external API
// =============================================================================
// Every call is a POST to `<url>/jsonrpc`:
//
//   { jsonrpc: '2.0', method: 'call', id,
//     params: { service, method, args } }
//
// `common.login(db, login, apiKey)` resolves the user id once; record calls
// then go through `object.execute_kw(db, uid, apiKey, model, method, args)`.
//
// No retries here: failures are classified and the queue decides.
//   • network / timeout, HTTP 408, 429, 5xx      → TransientSyncError
//   • other HTTP 4xx                             → PermanentSyncError
//   • RPC error naming a validation / access /
//     user / missing-record error                → PermanentSyncError
//   • any other RPC error                        → TransientSyncError
// =============================================================================
import axios from 'axios';
import { z } from 'zod';
import { JsonPayload } from '../types';
import { RemoteClient } from './syncModule';
import { PermanentSyncError, SyncError, TransientSyncError } from '../utils/syncErrors';
import logger from '../utils/logger';

export interface ErpClientOptions {
  url: string;
  database: string;
  login: string;
  apiKey: string;
  timeoutMs: number;
}

/** The one HTTP call the client makes */
export interface RpcTransport {
  post(url: string, body: unknown): Promise<{ data: unknown }>;
}

const PERMANENT_RPC_ERRORS = /ValidationError|AccessError|UserError|MissingError|AccessDenied/;

const rpcResponseSchema = z.object({
  result: z.unknown().optional(),
  error: z
    .object({
      message: z.string().optional(),
      data: z
        .object({
          name: z.string().optional(),
          message: z.string().optional(),
        })
        .optional(),
    })
    .optional(),
});

const idSchema = z.number().int().positive();
const recordsSchema = z.array(z.record(z.unknown()));

export class ErpClient implements RemoteClient {
  private readonly http: RpcTransport;
  private uid: number | null = null;
  private requestId = 0;

  constructor(
    private readonly options: ErpClientOptions,
    http?: RpcTransport,
  ) {
    if (http) {
      this.http = http;
    } else {
      const instance = axios.create({
        baseURL: options.url.replace(/\/+$/, ''),
        timeout: options.timeoutMs,
        headers: { 'Content-Type': 'application/json' },
      });
      this.http = { post: (url, body) => instance.post<unknown>(url, body) };
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // RemoteClient
  // ───────────────────────────────────────────────────────────────────────────

  async create(model: string, values: JsonPayload): Promise<number> {
    const result = await this.execute(model, 'create', [values]);
    const parsed = idSchema.safeParse(result);
    if (!parsed.success) {
      throw new TransientSyncError(`Unexpected create response from ${model}.`);
    }
    return parsed.data;
  }

  /** One `create` call with a list of values; ids come back in order. */
  async createMany(model: string, valuesList: JsonPayload[]): Promise<number[]> {
    if (valuesList.length === 0) return [];
    const result = await this.execute(model, 'create', [valuesList]);
    const parsed = z.array(z.number().int()).safeParse(result);
    if (!parsed.success) {
      throw new TransientSyncError(`Unexpected bulk create response from ${model}.`);
    }
    return parsed.data;
  }

  async write(model: string, ids: number[], values: JsonPayload): Promise<void> {
    await this.execute(model, 'write', [ids, values]);
  }

  async unlink(model: string, ids: number[]): Promise<void> {
    await this.execute(model, 'unlink', [ids]);
  }

  async read(model: string, ids: number[]): Promise<JsonPayload[]> {
    const result = await this.execute(model, 'read', [ids]);
    const parsed = recordsSchema.safeParse(result);
    if (!parsed.success) {
      throw new TransientSyncError(`Unexpected read response from ${model}.`);
    }
    return parsed.data;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // JSON-RPC
  // ───────────────────────────────────────────────────────────────────────────

  /** Resolve (and cache) the user id for the configured credentials. */
  async authenticate(): Promise<number> {
    if (this.uid !== null) return this.uid;

    const { database, login, apiKey } = this.options;
    const result = await this.call('common', 'login', [database, login, apiKey]);
    const parsed = idSchema.safeParse(result);
    if (!parsed.success) {
      throw new PermanentSyncError('ERP authentication failed: check login and API key.');
    }

    this.uid = parsed.data;
    logger.info('Authenticated against ERP', { database, uid: this.uid });
    return this.uid;
  }

  private async execute(model: string, method: string, args: unknown[]): Promise<unknown> {
    const uid = await this.authenticate();
    const { database, apiKey } = this.options;
    return this.call('object', 'execute_kw', [database, uid, apiKey, model, method, args]);
  }

  private async call(service: string, method: string, args: unknown[]): Promise<unknown> {
    const body = {
      jsonrpc: '2.0',
      method: 'call',
      params: { service, method, args },
      id: ++this.requestId,
    };

    let data: unknown;
    try {
      ({ data } = await this.http.post('/jsonrpc', body));
    } catch (err) {
      throw toSyncError(err);
    }

    const parsed = rpcResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new TransientSyncError('Malformed JSON-RPC response.');
    }

    const { error, result } = parsed.data;
    if (error) {
      const name = error.data?.name ?? '';
      const message = error.data?.message || error.message || 'Unknown RPC error';
      logger.warn('ERP RPC error', { service, method, name });
      throw PERMANENT_RPC_ERRORS.test(name)
        ? new PermanentSyncError(message)
        : new TransientSyncError(message);
    }
    return result;
  }
}

/** Map a transport failure onto the sync error taxonomy. */
export function toSyncError(err: unknown): SyncError {
  if (err instanceof SyncError) return err;

  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    if (status === undefined) {
      return new TransientSyncError(`ERP unreachable: ${err.code ?? err.message}`);
    }
    if (status === 408 || status === 429 || status >= 500) {
      return new TransientSyncError(`ERP responded with HTTP ${status}`);
    }
    return new PermanentSyncError(`ERP rejected the request with HTTP ${status}`);
  }

  return new TransientSyncError(err instanceof Error ? err.message : String(err));
}
