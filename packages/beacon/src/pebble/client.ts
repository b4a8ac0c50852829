import * as http from 'node:http';
import * as yaml from 'yaml';
import { z } from 'zod';
import { PebbleError } from '../core';

export interface PebbleService {
  override: 'replace' | 'merge';
  summary?: string;
  command: string;
  startup?: 'enabled' | 'disabled';
  environment?: Record<string, string>;
}

export interface PebbleLayer {
  summary?: string;
  description?: string;
  services: Record<string, PebbleService>;
}

/** The part of the Pebble API the charms drive. */
export interface PebbleClient {
  canConnect(): Promise<boolean>;
  /** Adds a layer, merged into an existing one with the same label. */
  addLayer(label: string, layer: PebbleLayer): Promise<void>;
  /** Starts new services and restarts changed ones. */
  replan(): Promise<void>;
}

const ResponseSchema = z.object({
  type: z.enum(['sync', 'async', 'error']),
  'status-code': z.number(),
  change: z.string().optional(),
  result: z.unknown(),
});

const ChangeSchema = z.object({
  ready: z.boolean(),
  err: z.string().optional(),
});

export interface SocketPebbleClientOptions {
  /** How long replan waits for its change (defaults to 60s) */
  changeTimeoutSeconds?: number;
}

/** Talks to the Pebble daemon of a workload container over its Unix socket. */
export class SocketPebbleClient implements PebbleClient {
  constructor(
    private readonly socketPath: string,
    private readonly options: SocketPebbleClientOptions = {},
  ) {}

  /** Socket of a container as mounted into the charm container. */
  static forContainer(container: string): SocketPebbleClient {
    return new SocketPebbleClient(`/charm/containers/${container}/pebble.socket`);
  }

  async canConnect(): Promise<boolean> {
    try {
      await this.request('GET', '/v1/system-info');
      return true;
    } catch (error) {
      if (error instanceof PebbleError) return false;
      throw error;
    }
  }

  async addLayer(label: string, layer: PebbleLayer): Promise<void> {
    await this.request('POST', '/v1/layers', {
      action: 'add',
      combine: true,
      label,
      format: 'yaml',
      layer: yaml.stringify(layer),
    });
  }

  async replan(): Promise<void> {
    const response = await this.request('POST', '/v1/services', { action: 'replan', services: [] });
    if (!response.change) return;

    const timeout = this.options.changeTimeoutSeconds ?? 60;
    const waited = await this.request('GET', `/v1/changes/${response.change}/wait?timeout=${timeout}s`);
    const change = ChangeSchema.parse(waited.result);
    if (change.err) throw new PebbleError(`replan failed: ${change.err}`);
  }

  private request(method: string, path: string, body?: unknown): Promise<z.infer<typeof ResponseSchema>> {
    return new Promise((resolve, reject) => {
      const payload = body === undefined ? undefined : JSON.stringify(body);
      const req = http.request(
        {
          socketPath: this.socketPath,
          path,
          method,
          headers: payload ? { 'Content-Type': 'application/json' } : undefined,
        },
        (res) => {
          const chunks: Buffer[] = [];
          res.on('data', (chunk: Buffer) => chunks.push(chunk));
          res.on('end', () => {
            let body: unknown;
            try {
              body = JSON.parse(Buffer.concat(chunks).toString('utf-8'));
            } catch (error) {
              reject(new PebbleError(`${method} ${path}: invalid JSON response (${String(error)})`, res.statusCode));
              return;
            }
            const parsed = ResponseSchema.safeParse(body);
            if (!parsed.success) {
              reject(new PebbleError(`unexpected response from ${method} ${path}`, res.statusCode));
            } else if (parsed.data.type === 'error') {
              reject(new PebbleError(`${method} ${path}: ${JSON.stringify(parsed.data.result)}`, res.statusCode));
            } else {
              resolve(parsed.data);
            }
          });
        },
      );
      req.on('error', (error) => reject(new PebbleError(`${method} ${path}: ${error.message}`)));
      if (payload) req.write(payload);
      req.end();
    });
  }
}
