import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import { ConfigurationError } from '@cloud-narrator/contracts';

const HostConfigFileSchema = z.object({
  GCP_PROJECT_ID: z.string().min(1).optional(),
  GCP_ZONE: z.string().min(1),
  INSTANCE_NAME: z.string().min(1),
  REMOTE_USER: z.string().regex(/^[a-z_][a-z0-9_.-]*$/i, 'expected a POSIX user name'),
});

export type HostConfigFile = z.infer<typeof HostConfigFileSchema>;

export interface HostConfig {
  projectId?: string;
  zone: string;
  instanceName: string;
  remoteUser: string;
  remoteHome: string;
}

export function parseHostConfig(input: unknown, source = 'host config'): HostConfig {
  const result = HostConfigFileSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid ${source}: ${issues}`, { cause: result.error });
  }
  const file = result.data;
  return {
    projectId: file.GCP_PROJECT_ID,
    zone: file.GCP_ZONE,
    instanceName: file.INSTANCE_NAME,
    remoteUser: file.REMOTE_USER,
    remoteHome: `/home/${file.REMOTE_USER}`,
  };
}

export async function loadHostConfig(filePath: string): Promise<HostConfig> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error: unknown) {
    throw new ConfigurationError(`Host config ${filePath} not found or unreadable`, {
      cause: error,
    });
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error: unknown) {
    throw new ConfigurationError(`Host config ${filePath} is not valid JSON`, { cause: error });
  }
  return parseHostConfig(parsed, `host config ${filePath}`);
}
