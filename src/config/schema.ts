// Session configuration schema and default resolution.
// Static defaults live in the zod schema; defaults that depend on the machine
// (home directory, user name, installed GRASS version) are computed in resolveConfig().
import { existsSync, readFileSync } from 'fs';
import { homedir, userInfo } from 'os';
import path from 'path';
import { z } from 'zod';
import type { SessionConfig } from '../types/config.js';
import { GrassError, GrassErrorCode } from '../shared/errors.js';

export const ERROR_MODES = ['raise', 'console', 'quiet', 'silent'] as const;

export const sessionConfigSchema = z
  .object({
    gisbase: z.string().min(1),
    location: z.string().min(1),
    gisdbase: z.string().min(1).optional(),
    mapset: z.string().min(1).optional(),
    version: z.string().min(1).optional(),
    messageFormat: z.string().min(1).default('plain'),
    trueColor: z.boolean().default(true),
    transparent: z.boolean().default(true),
    pngAutoWrite: z.boolean().default(true),
    gnuplot: z.string().min(1).default('gnuplot -persist'),
    gui: z.string().min(1).default('wxpython'),
    errors: z.enum(ERROR_MODES).default('raise'),
    echo: z.union([z.enum(['commands', 'output']), z.literal(false)]).default('commands'),
    log: z.string().min(1).optional(),
    history: z.string().min(1).optional(),
    dry: z.boolean().default(false),
    locals: z.record(z.unknown()).optional(),
  })
  .strict();

export type ParsedSessionConfig = z.infer<typeof sessionConfigSchema>;

/** Parse a configuration object, throwing CONFIG_INVALID with every issue listed. */
export function parseSessionConfig(input: unknown): ParsedSessionConfig {
  const result = sessionConfigSchema.safeParse(input);
  if (!result.success) {
    throw new GrassError(
      GrassErrorCode.CONFIG_INVALID,
      `Invalid session configuration: ${formatIssues(result.error)}`,
      { issues: result.error.issues },
    );
  }
  return result.data;
}

/** Validate the input and apply all defaults. Called once per context. */
export function resolveConfig(input: unknown, env: NodeJS.ProcessEnv = process.env): SessionConfig {
  const parsed = parseSessionConfig(input);
  return {
    gisbase: parsed.gisbase,
    location: parsed.location,
    gisdbase: parsed.gisdbase ?? path.join(env.HOME ?? homedir(), 'grassdata'),
    mapset: parsed.mapset ?? defaultMapset(env),
    version: parsed.version ?? readVersionNumber(parsed.gisbase),
    messageFormat: parsed.messageFormat,
    trueColor: parsed.trueColor,
    transparent: parsed.transparent,
    pngAutoWrite: parsed.pngAutoWrite,
    gnuplot: parsed.gnuplot,
    gui: parsed.gui,
    errors: parsed.errors,
    echo: parsed.echo,
    log: parsed.log,
    history: parsed.history,
    dry: parsed.dry,
  };
}

/** First token of <gisbase>/etc/VERSIONNUMBER, e.g. "8.3.2" from "8.3.2 2024 (2024)". */
export function readVersionNumber(gisbase: string): string | undefined {
  const versionFile = path.join(gisbase, 'etc', 'VERSIONNUMBER');
  if (!existsSync(versionFile)) return undefined;
  const [version] = readFileSync(versionFile, 'utf-8').split(/\s+/).filter(Boolean);
  return version;
}

function defaultMapset(env: NodeJS.ProcessEnv): string {
  return env.USER ?? env.USERNAME ?? userInfo().username;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
