import { APIGatewayProxyEvent, ScheduledEvent } from 'aws-lambda';
import { handler } from '../cron/market-research';

const mockRun = jest.fn();
const mockInitialize = jest.fn();

jest.mock('../../services/market-research-service', () => ({
  MarketResearchService: {
    initialize: (...args: unknown[]) => mockInitialize(...args),
  },
}));

const scheduledEvent = {
  'detail-type': 'Scheduled Event',
  source: 'aws.events',
} as unknown as ScheduledEvent;

const apiEvent = (headers: Record<string, string>) => ({ headers }) as unknown as APIGatewayProxyEvent;

describe('Market Research Handler', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    jest.clearAllMocks();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    process.env = { ...originalEnv, CRON_API_KEY: 'test-secret', SCHEDULE_TIME: '', SCHEDULE_DAYS: '' };
    mockInitialize.mockReturnValue({ run: mockRun });
    mockRun.mockResolvedValue({
      success: true,
      timestamp: '2026-10-19 09:30:00',
      message: 'Market research completed successfully',
    });
  });

  afterEach(() => {
    process.env = originalEnv;
    jest.restoreAllMocks();
  });

  it('should run on a scheduled event without an API key', async () => {
    const result = await handler(scheduledEvent);

    expect(result.statusCode).toBe(200);
    expect(JSON.parse(result.body)).toEqual({
      success: true,
      timestamp: '2026-10-19 09:30:00',
      message: 'Market research completed successfully',
    });
    expect(mockInitialize).toHaveBeenCalledTimes(1);
  });

  it('should run on an API request with a valid key', async () => {
    const result = await handler(apiEvent({ 'x-api-key': 'test-secret' }));

    expect(result.statusCode).toBe(200);
    expect(mockRun).toHaveBeenCalledTimes(1);
  });

  it('should reject an invalid API key', async () => {
    const result = await handler(apiEvent({ 'X-API-Key': 'wrong-key' }));

    expect(result.statusCode).toBe(401);
    expect(JSON.parse(result.body)).toEqual({
      status: 'error',
      code: 'AUTHENTICATION_ERROR',
      message: 'Invalid API key',
    });
    expect(mockRun).not.toHaveBeenCalled();
  });

  it('should require an API key on API requests', async () => {
    const result = await handler(apiEvent({ 'content-type': 'application/json' }));

    expect(result.statusCode).toBe(400);
    expect(JSON.parse(result.body)).toEqual({
      status: 'error',
      code: 'VALIDATION_ERROR',
      message: 'x-api-key: API key is required',
    });
  });

  it('should answer an empty API key as missing', async () => {
    const result = await handler(apiEvent({ 'x-api-key': '' }));

    expect(result.statusCode).toBe(400);
    expect(JSON.parse(result.body).message).toBe('x-api-key: API key is required');
  });

  it('should report an invalid environment as a server error without details', async () => {
    process.env.SCHEDULE_TIME = '25:00';

    const result = await handler(apiEvent({ 'x-api-key': 'anything' }));

    expect(result.statusCode).toBe(500);
    expect(JSON.parse(result.body)).toEqual({
      status: 'error',
      code: 'CONFIGURATION_ERROR',
      message: 'Service configuration is invalid',
    });
    expect(mockInitialize).not.toHaveBeenCalled();
  });

  it('should reject API requests when no key is configured', async () => {
    delete process.env.CRON_API_KEY;

    const result = await handler(apiEvent({ 'x-api-key': 'test-secret' }));

    expect(result.statusCode).toBe(401);
  });

  it('should answer 500 when the run fails', async () => {
    mockRun.mockResolvedValue({
      success: false,
      timestamp: '2026-10-19 09:30:00',
      error: 'collector crashed',
      message: 'Market research failed',
    });

    const result = await handler(scheduledEvent);

    expect(result.statusCode).toBe(500);
    expect(JSON.parse(result.body)).toMatchObject({ success: false, error: 'collector crashed' });
  });
});
