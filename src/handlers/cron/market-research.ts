import { APIGatewayProxyEvent, APIGatewayProxyResult, ScheduledEvent } from 'aws-lambda';
import { loadConfig } from '../../config/env';
import { MarketResearchService } from '../../services/market-research-service';
import { wrapHandler } from '../../middleware/lambda-error-handler';
import { handleZodError } from '../../middleware/zod-error-handler';
import { AppError, AuthenticationError, ValidationError } from '../../utils/errors/app-error';
import { AppConfig } from '../../types/models/config';
import {
  API_KEY_HEADER,
  apiKeyHeaderSchema,
  marketResearchEventSchema,
} from '../../types/schemas/handlers';
import { HTTP_HEADERS, HTTP_STATUS } from '../../constants/http';

export type MarketResearchEvent = ScheduledEvent | APIGatewayProxyEvent;

/**
 * An invalid environment is a server fault; callers only see a generic 500
 */
const loadHandlerConfig = (): AppConfig => {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ValidationError) {
      console.error('Invalid market research configuration:', error.message);
      throw new AppError(
        'Service configuration is invalid',
        HTTP_STATUS.INTERNAL_SERVER_ERROR,
        false,
        'CONFIGURATION_ERROR'
      );
    }
    throw error;
  }
};

/**
 * Handler that runs the market research workflow on a schedule or on demand
 */
const marketResearchHandler = async (event: MarketResearchEvent): Promise<APIGatewayProxyResult> => {
  const { headers } = marketResearchEventSchema.parse(event);
  console.log('Starting market research run...', {
    headers: headers ? {
      'x-api-key-exists': !!headers[API_KEY_HEADER],
      'X-API-Key-exists': !!headers['X-API-Key']
    } : 'No headers'
  });

  const config = loadHandlerConfig();

  // API Gateway events must carry the cron API key
  if (headers) {
    const apiKeyResult = apiKeyHeaderSchema.safeParse({
      [API_KEY_HEADER]: headers[API_KEY_HEADER] || headers['X-API-Key']
    });

    if (!apiKeyResult.success) {
      throw handleZodError(apiKeyResult.error, 'headers');
    }

    if (!config.cronApiKey || apiKeyResult.data[API_KEY_HEADER] !== config.cronApiKey) {
      throw new AuthenticationError('Invalid API key');
    }
  }

  const service = MarketResearchService.initialize(config);
  const result = await service.run();

  return {
    statusCode: result.success ? HTTP_STATUS.OK : HTTP_STATUS.INTERNAL_SERVER_ERROR,
    headers: HTTP_HEADERS,
    body: JSON.stringify(result)
  };
};

export const handler = wrapHandler(marketResearchHandler);
