import { readFile, access } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError, getErrorMessage } from '../core/errors.js';
import type { EndpointDescriptor } from '../types/index.js';

const requiredText = (label: string) =>
  z.string({ required_error: `${label} is required`, invalid_type_error: `${label} is required` })
    .trim()
    .min(1, `${label} is required`);

const environmentSchema = z.object({
  clientId: requiredText('ClientId'),
  engine: z.enum(['postgres', 'mysql']).default('postgres'),
  hostname: requiredText('Hostname'),
  port: z.number({ required_error: 'Port must be between 1 and 65535', invalid_type_error: 'Port must be between 1 and 65535' })
    .int('Port must be between 1 and 65535')
    .min(1, 'Port must be between 1 and 65535')
    .max(65535, 'Port must be between 1 and 65535'),
  database: requiredText('Database'),
  username: requiredText('Username'),
  password: requiredText('Password')
});

const environmentConfigSchema = z.object({
  environments: z.array(environmentSchema).min(1, 'No environments found in configuration')
}).superRefine((config, ctx) => {
  const seen = new Map<string, number>();
  config.environments.forEach((environment, index) => {
    const firstIndex = seen.get(environment.clientId);
    if (firstIndex !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['environments', index, 'clientId'],
        message: `ClientId '${environment.clientId}' duplicates Environment ${firstIndex + 1}`
      });
      return;
    }
    seen.set(environment.clientId, index);
  });
});

type RawEnvironmentConfig = z.infer<typeof environmentConfigSchema>;

/**
 * Package root, used as the fallback location for a relative environments file.
 */
export const INSTALL_DIRECTORY = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');

function formatIssuePath(issuePath: ReadonlyArray<string | number>): string {
  if (issuePath[0] === 'environments' && typeof issuePath[1] === 'number') {
    return `Environment ${issuePath[1] + 1}`;
  }
  return 'Configuration';
}

/**
 * Validate parsed JSON and convert it into endpoint descriptors.
 */
export function parseEnvironmentConfig(raw: unknown): EndpointDescriptor[] {
  const parsed = environmentConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const lines = parsed.error.issues.map((issue) => `${formatIssuePath(issue.path)}: ${issue.message}`);
    throw new ConfigError(`Environment configuration validation failed:\n${lines.join('\n')}`, lines.join('; '));
  }
  return toEndpoints(parsed.data);
}

function toEndpoints(config: RawEnvironmentConfig): EndpointDescriptor[] {
  return config.environments.map((environment) =>
    Object.freeze({
      id: environment.clientId,
      engine: environment.engine,
      host: environment.hostname,
      port: environment.port,
      database: environment.database,
      username: environment.username,
      password: environment.password
    })
  );
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve the environments file: absolute paths as given, relative paths
 * against the working directory first and the install directory second.
 */
export async function resolveEnvironmentsFile(
  filePath: string,
  cwd: string = process.cwd(),
  installDirectory: string = INSTALL_DIRECTORY
): Promise<string> {
  if (!filePath.trim()) {
    throw new ConfigError('Environments file path cannot be empty');
  }

  if (path.isAbsolute(filePath)) {
    const absolutePath = path.resolve(filePath);
    if (await exists(absolutePath)) return absolutePath;
    throw new ConfigError(
      `The environments file '${filePath}' was not found.\nResolved path: ${absolutePath}`
    );
  }

  const candidates = [path.resolve(cwd, filePath), path.resolve(installDirectory, filePath)];
  for (const candidate of candidates) {
    if (await exists(candidate)) return candidate;
  }

  throw new ConfigError(
    `The environments file '${filePath}' was not found.\n` +
      `Searched locations:\n  1. Current working directory: ${candidates[0]}\n  2. Application install directory: ${candidates[1]}`
  );
}

/**
 * Read, parse and validate an environments file.
 */
export async function loadEnvironments(filePath: string): Promise<EndpointDescriptor[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Error loading environment file '${filePath}': ${getErrorMessage(error)}`);
  }

  if (!content.trim()) {
    throw new ConfigError('Environment file is empty');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in environment file '${filePath}': ${getErrorMessage(error)}`);
  }

  return parseEnvironmentConfig(raw);
}

/**
 * Display form of an endpoint with the password masked.
 */
export function describeEndpoint(endpoint: EndpointDescriptor): string {
  return `ClientId: ${endpoint.id}, Engine: ${endpoint.engine}, Host: ${endpoint.host}:${endpoint.port}, Database: ${endpoint.database}, User: ${endpoint.username}, Password: ***`;
}

export function maskedConnectionUrl(endpoint: EndpointDescriptor): string {
  const scheme = endpoint.engine === 'mysql' ? 'mysql' : 'postgresql';
  return `${scheme}://${endpoint.username}:***@${endpoint.host}:${endpoint.port}/${endpoint.database}`;
}
