/**
 * Juju hook tools as a CharmBackend.
 *
 * Every call shells out to a hook tool (`config-get`, `relation-get`, ...)
 * available on PATH while a hook runs.
 */
import { spawnSync } from 'node:child_process';
import * as yaml from 'yaml';
import { z } from 'zod';
import { HookToolError, type CharmBackend, type Logger, type RelationInfo, type Status, type StatusName } from 'istio-beacon';

/** Runs one hook tool and returns its stdout. */
export type HookToolRunner = (tool: string, args: string[], input?: string) => string;

export const runHookTool: HookToolRunner = (tool, args, input) => {
  const result = spawnSync(tool, args, { encoding: 'utf-8', input });
  if (result.error) throw new HookToolError(tool, null, result.error.message);
  if (result.status !== 0) throw new HookToolError(tool, result.status, result.stderr);
  return result.stdout;
};

const RelationDataSchema = z.record(z.string()).nullable().transform((data) => data ?? {});
const GoalStateSchema = z.object({
  units: z.record(z.object({ status: z.string() })).nullish(),
});
const StatusSchema = z.object({
  status: z.enum(['active', 'blocked', 'waiting', 'maintenance', 'unknown']),
  message: z.string().default(''),
});
const NetworkSchema = z.object({
  'ingress-addresses': z.array(z.string()).default([]),
});

export interface HookEnvironment {
  unitName: string;
  modelName: string;
  modelUuid: string;
}

const HookEnvironmentSchema = z.object({
  JUJU_UNIT_NAME: z.string().min(1),
  JUJU_MODEL_NAME: z.string().min(1),
  JUJU_MODEL_UUID: z.string().default(''),
});

export function hookEnvironment(env: NodeJS.ProcessEnv = process.env): HookEnvironment {
  const parsed = HookEnvironmentSchema.parse(env);
  return {
    unitName: parsed.JUJU_UNIT_NAME,
    modelName: parsed.JUJU_MODEL_NAME,
    modelUuid: parsed.JUJU_MODEL_UUID,
  };
}

export class HookToolsBackend implements CharmBackend {
  readonly appName: string;
  readonly unitName: string;
  readonly modelName: string;
  readonly modelUuid: string;

  private cachedConfig?: Record<string, unknown>;

  constructor(
    environment: HookEnvironment,
    private readonly run: HookToolRunner = runHookTool,
  ) {
    this.unitName = environment.unitName;
    this.appName = environment.unitName.split('/')[0] ?? environment.unitName;
    this.modelName = environment.modelName;
    this.modelUuid = environment.modelUuid;
  }

  private json<T extends z.ZodTypeAny>(schema: T, tool: string, args: string[]): z.infer<T> {
    return schema.parse(JSON.parse(this.run(tool, [...args, '--format=json'])));
  }

  isLeader(): boolean {
    return this.json(z.boolean(), 'is-leader', []);
  }

  config(): Record<string, unknown> {
    this.cachedConfig ??= this.json(z.record(z.unknown()), 'config-get', []);
    return this.cachedConfig;
  }

  plannedUnits(): number {
    const goal = this.json(GoalStateSchema, 'goal-state', []);
    return Object.values(goal.units ?? {}).filter((unit) => unit.status !== 'dying').length;
  }

  relationIds(endpoint: string): number[] {
    const ids = this.json(z.array(z.string()).nullable(), 'relation-ids', [endpoint]) ?? [];
    return ids.map((id) => Number(id.split(':').pop()));
  }

  relationInfo(endpoint: string, id: number): RelationInfo {
    const relation = `${endpoint}:${id}`;
    const remoteUnits = this.json(z.array(z.string()).nullable(), 'relation-list', ['-r', relation]) ?? [];
    const remoteApp = this.json(z.string().nullable(), 'relation-list', ['-r', relation, '--app']);
    return { id, endpoint, remoteApp: remoteApp || undefined, remoteUnits };
  }

  relationGet(endpoint: string, id: number, member: string, app: boolean): Record<string, string> {
    const args = ['-r', `${endpoint}:${id}`, '-', member];
    if (app) args.push('--app');
    return this.json(RelationDataSchema, 'relation-get', args);
  }

  relationSet(endpoint: string, id: number, data: Record<string, string>, app: boolean): void {
    const args = ['-r', `${endpoint}:${id}`];
    if (app) args.push('--app');
    args.push('--file', '-');
    this.run('relation-set', args, yaml.stringify(data));
  }

  bindAddress(endpoint: string): string | undefined {
    return this.json(NetworkSchema, 'network-get', [endpoint])['ingress-addresses'][0];
  }

  getStatus(): Status {
    const { status, message } = this.json(StatusSchema, 'status-get', ['--include-data']);
    return { name: status, message };
  }

  setStatus(status: Status): void {
    // juju only takes the settable states
    const settable: StatusName[] = ['active', 'blocked', 'waiting', 'maintenance'];
    if (!settable.includes(status.name)) return;
    this.run('status-set', [status.name, status.message]);
  }
}

/** Logger forwarding to `juju-log`, so lines land in the unit's debug-log. */
export function createJujuLogger(run: HookToolRunner = runHookTool): Logger {
  const log = (level: string) => (message: string) => {
    run('juju-log', ['--log-level', level, message]);
  };
  return {
    debug: log('DEBUG'),
    info: log('INFO'),
    warn: log('WARNING'),
    error: log('ERROR'),
  };
}
