import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'yaml';
import { z } from 'zod';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const AppConfigSchema = z.object({
  app: z
    .object({
      name: z.string().optional(),
      env: z.enum(['dev', 'prod', 'test']).optional(),
    })
    .optional(),
  logging: z
    .object({
      level: LogLevelSchema.optional(),
      color: z.boolean().optional(),
    })
    .optional(),
  dispatcher: z
    .object({
      stopOnFailure: z.boolean().optional(),
      maxHandlers: z.number().int().positive().optional(),
    })
    .optional(),
  registry: z
    .object({
      file: z.string().optional(),
      handlerRoot: z.string().optional(),
    })
    .optional(),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export type AppConfigRequired = {
  app: {
    name: string;
    env: 'dev' | 'prod' | 'test';
  };
  logging: {
    level: 'debug' | 'info' | 'warn' | 'error';
    color: boolean;
  };
  dispatcher: {
    stopOnFailure: boolean;
    maxHandlers: number;
  };
  registry: {
    /** Registry YAML, resolved against the working directory. */
    file: string;
    /** Base directory for handler modules named by a descriptor `path`. */
    handlerRoot: string;
  };
};

export const DEFAULT_CONFIG_PATH = resolve(process.cwd(), 'config', 'default.yaml');

let cachedConfig: AppConfigRequired | null = null;

function readConfigFile(filePath: string): AppConfig {
  if (!existsSync(filePath)) return {};
  const raw = parse(readFileSync(filePath, 'utf-8')) ?? {};
  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid config in ${filePath}: ${issues}`);
  }
  return result.data;
}

function envName(value: string | undefined): AppConfigRequired['app']['env'] | undefined {
  const parsed = z.enum(['dev', 'prod', 'test']).safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

function envLevel(value: string | undefined): AppConfigRequired['logging']['level'] | undefined {
  const parsed = LogLevelSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

export function loadConfig(filePath: string = DEFAULT_CONFIG_PATH): AppConfigRequired {
  if (cachedConfig) return cachedConfig;
  const cfg = readConfigFile(filePath);
  const env = envName(process.env.SITEHOOK_ENV) ?? envName(process.env.NODE_ENV) ?? cfg.app?.env ?? 'prod';

  cachedConfig = {
    app: {
      name: cfg.app?.name ?? 'sitehook',
      env,
    },
    logging: {
      level: envLevel(process.env.LOG_LEVEL) ?? cfg.logging?.level ?? 'info',
      color: cfg.logging?.color ?? true,
    },
    dispatcher: {
      stopOnFailure: cfg.dispatcher?.stopOnFailure ?? false,
      maxHandlers: cfg.dispatcher?.maxHandlers ?? 1000,
    },
    registry: {
      file: resolve(process.cwd(), process.env.SITEHOOK_REGISTRY || cfg.registry?.file || 'config/registry.yaml'),
      handlerRoot: resolve(process.cwd(), cfg.registry?.handlerRoot ?? 'dist/src'),
    },
  };

  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
