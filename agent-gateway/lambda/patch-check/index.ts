import { SSMClient } from '@aws-sdk/client-ssm';
import type { ScheduledEvent } from 'aws-lambda';
import { requireEnv } from '../shared/env';
import { Logger } from '../shared/logger';
import { CommandDispatch, CommandSender, sendInstanceCommand } from '../shared/ssm-command';

/**
 * Patch Check Handler
 *
 * Scheduled by EventBridge. Runs AWS-RunPatchBaseline in Scan mode so the
 * instance reports patch compliance to SSM without installing anything.
 */

export const PATCH_BASELINE_DOCUMENT = 'AWS-RunPatchBaseline';

export interface PatchCheckDeps {
  readonly ssm: CommandSender;
  readonly env: NodeJS.ProcessEnv;
  readonly logger: Logger;
}

export async function runPatchCheck(event: ScheduledEvent, deps: PatchCheckDeps): Promise<CommandDispatch> {
  const { ssm, env, logger } = deps;
  const instanceId = requireEnv(env, 'INSTANCE_ID');

  logger.info('Patch check triggered', { instanceId, eventId: event.id, time: event.time });

  try {
    return await sendInstanceCommand(
      ssm,
      {
        instanceId,
        documentName: PATCH_BASELINE_DOCUMENT,
        parameters: { Operation: ['Scan'] },
        comment: 'Scheduled patch compliance scan',
      },
      logger
    );
  } catch (error) {
    logger.error('Patch check failed', { instanceId, error });
    throw error;
  }
}

const ssm = new SSMClient({});
const logger = new Logger('PatchCheckHandler');

export const handler = async (event: ScheduledEvent): Promise<CommandDispatch> =>
  runPatchCheck(event, { ssm, env: process.env, logger });
