import { SendCommandCommand, SSMClient } from '@aws-sdk/client-ssm';
import { Logger } from './logger';

export type CommandSender = Pick<SSMClient, 'send'>;

export interface InstanceCommand {
  readonly instanceId: string;
  readonly documentName: string;
  readonly parameters?: Record<string, string[]>;
  readonly comment: string;
  readonly timeoutSeconds?: number;
}

export interface CommandDispatch {
  readonly commandId: string;
  readonly instanceId: string;
  readonly documentName: string;
}

/**
 * Sends one SSM Run Command to a single instance and returns without
 * waiting for it to finish. Results land in the SSM command history.
 */
export async function sendInstanceCommand(
  ssm: CommandSender,
  command: InstanceCommand,
  logger: Logger
): Promise<CommandDispatch> {
  const { instanceId, documentName, parameters, comment, timeoutSeconds = 600 } = command;

  logger.debug('Sending SSM command', { instanceId, documentName, parameters });

  const response = await ssm.send(
    new SendCommandCommand({
      InstanceIds: [instanceId],
      DocumentName: documentName,
      Parameters: parameters,
      Comment: comment,
      TimeoutSeconds: timeoutSeconds,
    })
  );

  const commandId = response.Command?.CommandId;
  if (!commandId) {
    throw new Error(`SSM did not return a command id for ${documentName} on ${instanceId}`);
  }

  logger.info('SSM command sent', { instanceId, documentName, commandId });
  return { commandId, instanceId, documentName };
}
