import type { ScheduledEvent } from 'aws-lambda';

export const TEST_INSTANCE_ID = 'i-0123456789abcdef0';

export function scheduledEvent(id = 'event-1'): ScheduledEvent {
  return {
    version: '0',
    id,
    'detail-type': 'Scheduled Event',
    source: 'aws.events',
    account: '123456789012',
    time: '2026-01-05T03:00:00Z',
    region: 'eu-west-1',
    resources: ['arn:aws:events:eu-west-1:123456789012:rule/test-schedule'],
    detail: {},
  };
}

/** Silences handler logging for the duration of a test file */
export function silenceConsole(): void {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });
}
