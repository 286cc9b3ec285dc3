import Ajv from 'ajv';
import Ajv2019 from 'ajv/dist/2019.js';
import Ajv2020 from 'ajv/dist/2020.js';

import type { JsonSchema, LogEntry, LogSeverity, PreparedTool, ToolDescriptor, ToolInvokeOptions } from '../types.js';
import type { LogSink, ToolProvider } from './types.js';
import type { Ajv as AjvClass, ErrorObject, Options as AjvOptions, ValidateFunction } from 'ajv';

type AjvInstance = AjvClass;
type AjvErrorObject = ErrorObject<string, Record<string, unknown>>;
type AjvConstructor = new (options?: AjvOptions) => AjvInstance;
const AjvCtor: AjvConstructor = Ajv as unknown as AjvConstructor;
const Ajv2019Ctor: AjvConstructor = Ajv2019 as unknown as AjvConstructor;
const Ajv2020Ctor: AjvConstructor = Ajv2020 as unknown as AjvConstructor;

import { errorMessage, sanitizeToolName, warn } from '../utils.js';

import { filterByPatterns } from './tool-filter.js';
import { InvalidParametersError } from './tool-errors.js';

export interface PrepareToolsOptions {
  // Call warmup() (connect) on every provider before discovery
  autoConnect?: boolean;
  onLog?: LogSink;
}

// Provider name → glob patterns; a provider without an entry is not filtered
export type AllowedToolsByProvider = ReadonlyMap<string, readonly string[]>;

type SchemaDialect = 'draft07' | 'draft2019' | 'draft2020';

const DIALECT_CTORS: Record<SchemaDialect, AjvConstructor> = {
  draft07: AjvCtor,
  draft2019: Ajv2019Ctor,
  draft2020: Ajv2020Ctor,
};

const ajvLogger: NonNullable<AjvOptions['logger']> = {
  log: () => undefined,
  warn: (...args: unknown[]) => { warn(`ajv: ${args.map((a) => String(a)).join(' ')}`); },
  error: (...args: unknown[]) => { warn(`ajv: ${args.map((a) => String(a)).join(' ')}`); },
};

/**
 * One validator per JSON-schema dialect, created on first use. Schemas that
 * declare an older or unknown `$schema` are compiled as draft-07 with the
 * declaration dropped.
 */
class SchemaCompiler {
  private readonly instances = new Map<SchemaDialect, AjvInstance>();

  compile(schema: JsonSchema): ValidateFunction {
    const declared = typeof schema.$schema === 'string' ? schema.$schema : undefined;
    const dialect = dialectOf(declared);
    if (declared !== undefined && dialect === undefined) {
      const rest: JsonSchema = { ...schema };
      delete rest.$schema;
      return this.instance('draft07').compile(rest);
    }
    return this.instance(dialect ?? 'draft07').compile(schema);
  }

  private instance(dialect: SchemaDialect): AjvInstance {
    const existing = this.instances.get(dialect);
    if (existing !== undefined) return existing;
    const Ctor = DIALECT_CTORS[dialect];
    const created = new Ctor({ allErrors: true, strict: false, logger: ajvLogger });
    this.instances.set(dialect, created);
    return created;
  }
}

function dialectOf(uri: string | undefined): SchemaDialect | undefined {
  if (uri === undefined) return undefined;
  if (uri.includes('2020-12')) return 'draft2020';
  if (uri.includes('2019-09')) return 'draft2019';
  if (uri.includes('draft-07')) return 'draft07';
  return undefined;
}

const formatAjvErrors = (errors: readonly AjvErrorObject[]): string => errors
  .map((e) => `${e.instancePath.length > 0 ? e.instancePath : '/'} ${e.message ?? 'is invalid'}`)
  .join('; ');

function emit(onLog: LogSink | undefined, provider: ToolProvider, severity: LogSeverity, message: string, error?: unknown): void {
  if (onLog === undefined) {
    // without a log sink, problems still reach the warning channel
    if (severity === 'ERR' || severity === 'WRN') warn(`preparer:${provider.name}: ${message}`);
    return;
  }
  const entry: LogEntry = {
    timestamp: Date.now(),
    severity,
    direction: 'response',
    type: 'tool',
    toolKind: provider.kind,
    remoteIdentifier: `preparer:${provider.name}`,
    fatal: false,
    message,
    ...(severity === 'ERR' && error instanceof Error && error.stack !== undefined ? { stack: error.stack } : {}),
  };
  try { onLog(entry); } catch (e) { warn(`preparer onLog failed: ${errorMessage(e)}`); }
}

function wrapTool(compiler: SchemaCompiler, descriptor: ToolDescriptor, name: string): PreparedTool {
  const provider = descriptor.provider;
  const validate: ValidateFunction = compiler.compile(descriptor.inputSchema);
  const originalName = descriptor.name;
  return {
    name,
    originalName,
    providerName: provider.name,
    kind: provider.kind,
    description: descriptor.description,
    schema: descriptor.inputSchema,
    invoke: async (args: Record<string, unknown>, opts?: ToolInvokeOptions): Promise<string> => {
      if (!validate(args)) {
        const errors: AjvErrorObject[] = validate.errors ?? [];
        throw new InvalidParametersError(`Invalid arguments for tool '${name}': ${formatAjvErrors(errors)}`, { provider: provider.name });
      }
      return await provider.invoke(originalName, args, opts);
    },
  };
}

/**
 * Discover every provider's tools, filter them by the provider's allow-list,
 * normalize their names and wrap them as PreparedTools.
 *
 * Failures are contained: a provider that cannot warm up or list is skipped,
 * a tool whose schema does not compile or whose normalized name is already
 * taken is skipped. Order follows providers, then each provider's listing.
 */
export async function prepareTools(
  providers: readonly ToolProvider[],
  allowedToolsByProvider: AllowedToolsByProvider,
  opts: PrepareToolsOptions = {}
): Promise<PreparedTool[]> {
  const autoConnect = opts.autoConnect ?? true;
  const compiler = new SchemaCompiler();
  const prepared: PreparedTool[] = [];
  const taken = new Map<string, string>();

  for (const provider of providers) {
    let descriptors: ToolDescriptor[];
    try {
      if (autoConnect) await provider.warmup();
      descriptors = await provider.listCallables();
    } catch (e) {
      emit(opts.onLog, provider, 'ERR', `failed to discover tools of '${provider.name}': ${errorMessage(e)}`, e);
      continue;
    }

    const allowed = filterByPatterns(descriptors, allowedToolsByProvider.get(provider.name));
    if (allowed.length < descriptors.length) {
      emit(opts.onLog, provider, 'VRB', `allow-list kept ${String(allowed.length)} of ${String(descriptors.length)} tools`);
    }

    allowed.forEach((descriptor) => {
      const name = sanitizeToolName(descriptor.name);
      const owner = taken.get(name);
      if (owner !== undefined) {
        emit(opts.onLog, provider, 'WRN', `tool '${descriptor.name}' skipped: name '${name}' already used by '${owner}'`);
        return;
      }
      try {
        prepared.push(wrapTool(compiler, descriptor, name));
        taken.set(name, `${provider.name}/${descriptor.name}`);
      } catch (e) {
        emit(opts.onLog, provider, 'ERR', `failed to prepare tool '${descriptor.name}': ${errorMessage(e)}`, e);
      }
    });
  }
  return prepared;
}
