import { Logger } from '../../lambda/shared/logger';
import { pruneCommands, runDockerCleanup, SHELL_SCRIPT_DOCUMENT } from '../../lambda/docker-cleanup';
import { scheduledEvent, silenceConsole, TEST_INSTANCE_ID } from './fixtures';

describe('Docker cleanup handler', () => {
  silenceConsole();

  const logger = new Logger('DockerCleanupHandler');

  test('pruneCommands filters by age', () => {
    expect(pruneCommands(24)).toEqual([
      'set -e',
      'docker system df',
      'docker image prune --all --force --filter "until=24h"',
      'docker builder prune --all --force --filter "until=24h"',
      'docker system df',
    ]);
  });

  test('sends the prune script with the configured retention', async () => {
    const send = jest.fn().mockResolvedValue({ Command: { CommandId: 'cmd-prune' } });

    const result = await runDockerCleanup(scheduledEvent(), {
      ssm: { send },
      env: { INSTANCE_ID: TEST_INSTANCE_ID, IMAGE_RETENTION_HOURS: '48' },
      logger,
    });

    expect(result.commandId).toBe('cmd-prune');
    expect(send.mock.calls[0][0].input).toEqual({
      InstanceIds: [TEST_INSTANCE_ID],
      DocumentName: SHELL_SCRIPT_DOCUMENT,
      Parameters: { commands: pruneCommands(48) },
      Comment: 'Prune Docker images and build cache older than 48h',
      TimeoutSeconds: 600,
    });
  });

  test('defaults to a one-week retention', async () => {
    const send = jest.fn().mockResolvedValue({ Command: { CommandId: 'cmd-prune' } });

    await runDockerCleanup(scheduledEvent(), { ssm: { send }, env: { INSTANCE_ID: TEST_INSTANCE_ID }, logger });

    expect(send.mock.calls[0][0].input.Comment).toBe('Prune Docker images and build cache older than 168h');
  });

  test.each(['0', '-5', '1.5', 'week'])('rejects retention %s', async (hours) => {
    const send = jest.fn();

    await expect(
      runDockerCleanup(scheduledEvent(), {
        ssm: { send },
        env: { INSTANCE_ID: TEST_INSTANCE_ID, IMAGE_RETENTION_HOURS: hours },
        logger,
      })
    ).rejects.toThrow(`Environment variable IMAGE_RETENTION_HOURS must be a positive integer, got "${hours}"`);
    expect(send).not.toHaveBeenCalled();
  });

  test('logs and rethrows SSM failures', async () => {
    const failure = new Error('InvalidInstanceId');
    const send = jest.fn().mockRejectedValue(failure);
    const error = jest.spyOn(logger, 'error');

    await expect(
      runDockerCleanup(scheduledEvent(), { ssm: { send }, env: { INSTANCE_ID: TEST_INSTANCE_ID }, logger })
    ).rejects.toBe(failure);
    expect(error).toHaveBeenCalledWith('Docker cleanup failed', { instanceId: TEST_INSTANCE_ID, error: failure });
  });
});
