/**
 * Basecamp data source configuration: schema, form fields and validation.
 */

import { z } from 'zod';
import type { ConfigField } from '../../contracts/types.js';
import { BasecampClient, type BasecampClientOptions } from '../../clients/BasecampClient.js';
import { InvalidConfigurationError, MalformedRecordError, RemoteHttpError } from '../../types/errors.js';

export const basecampConfigSchema = z.object({
  url: z.string().trim().url(),
  username: z.string().min(1),
  password: z.string().min(1),
});

export type BasecampConfig = z.infer<typeof basecampConfigSchema>;

export const BASECAMP_CONFIG_FIELDS: readonly ConfigField[] = [
  { label: 'Basecamp URL', name: 'url', inputType: 'text', placeholder: 'https://basecamp.com/1234567' },
  { label: 'Username', name: 'username', inputType: 'text' },
  { label: 'Password', name: 'password', inputType: 'password' },
];

export interface ValidateConfigOptions extends BasecampClientOptions {
  userAgentApp?: string;
  timeoutMs?: number;
}

/**
 * Parse raw configuration without contacting Basecamp
 *
 * @throws {InvalidConfigurationError} If a field is missing, empty or the URL is invalid
 */
export function parseBasecampConfig(raw: unknown): BasecampConfig {
  const result = basecampConfigSchema.safeParse(raw);
  if (!result.success) {
    const fields = result.error.issues.map(i => i.path.join('.'));
    throw new InvalidConfigurationError(
      `Invalid Basecamp configuration: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
      { fields }
    );
  }
  return result.data;
}

/**
 * Validate candidate configuration by listing projects once.
 *
 * The probe result is discarded. HTTP failures, including rejected
 * credentials, and a response that is not a project list surface as
 * InvalidConfigurationError; nothing is retried.
 *
 * @returns The parsed configuration
 * @throws {InvalidConfigurationError}
 */
export async function validateBasecampConfig(
  raw: unknown,
  options: ValidateConfigOptions = {}
): Promise<BasecampConfig> {
  const config = parseBasecampConfig(raw);
  const client = new BasecampClient(
    { ...config, userAgentApp: options.userAgentApp, timeoutMs: options.timeoutMs },
    options
  );

  try {
    await client.listProjects();
  } catch (error) {
    if (error instanceof RemoteHttpError) {
      const reason = error.status === 401 || error.status === 403
        ? `Basecamp rejected the credentials for ${config.username} (HTTP ${error.status})`
        : `Could not reach Basecamp at ${config.url}: ${error.message}`;
      throw new InvalidConfigurationError(reason, { url: config.url, status: error.status }, error);
    }
    if (error instanceof MalformedRecordError) {
      throw new InvalidConfigurationError(
        `${config.url} did not answer with a Basecamp project list`,
        { url: config.url },
        error
      );
    }
    throw error;
  }

  return config;
}
