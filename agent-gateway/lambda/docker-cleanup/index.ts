import { SSMClient } from '@aws-sdk/client-ssm';
import type { ScheduledEvent } from 'aws-lambda';
import { positiveIntEnv, requireEnv } from '../shared/env';
import { Logger } from '../shared/logger';
import { CommandDispatch, CommandSender, sendInstanceCommand } from '../shared/ssm-command';

/**
 * Docker Cleanup Handler
 *
 * Scheduled by EventBridge. Prunes unused images and build cache on the
 * gateway host; agent sandboxes leave a steady trail of both behind.
 */

export const SHELL_SCRIPT_DOCUMENT = 'AWS-RunShellScript';
export const DEFAULT_IMAGE_RETENTION_HOURS = 168;

export interface DockerCleanupDeps {
  readonly ssm: CommandSender;
  readonly env: NodeJS.ProcessEnv;
  readonly logger: Logger;
}

export function pruneCommands(retentionHours: number): string[] {
  const filter = `--filter "until=${retentionHours}h"`;
  return [
    'set -e',
    'docker system df',
    `docker image prune --all --force ${filter}`,
    `docker builder prune --all --force ${filter}`,
    'docker system df',
  ];
}

export async function runDockerCleanup(event: ScheduledEvent, deps: DockerCleanupDeps): Promise<CommandDispatch> {
  const { ssm, env, logger } = deps;
  const instanceId = requireEnv(env, 'INSTANCE_ID');
  const retentionHours = positiveIntEnv(env, 'IMAGE_RETENTION_HOURS', DEFAULT_IMAGE_RETENTION_HOURS);

  logger.info('Docker cleanup triggered', { instanceId, retentionHours, eventId: event.id });

  try {
    return await sendInstanceCommand(
      ssm,
      {
        instanceId,
        documentName: SHELL_SCRIPT_DOCUMENT,
        parameters: { commands: pruneCommands(retentionHours) },
        comment: `Prune Docker images and build cache older than ${retentionHours}h`,
      },
      logger
    );
  } catch (error) {
    logger.error('Docker cleanup failed', { instanceId, error });
    throw error;
  }
}

const ssm = new SSMClient({});
const logger = new Logger('DockerCleanupHandler');

export const handler = async (event: ScheduledEvent): Promise<CommandDispatch> =>
  runDockerCleanup(event, { ssm, env: process.env, logger });
