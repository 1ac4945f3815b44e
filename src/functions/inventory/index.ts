/**
 * AWS Lambda handler for Cloud Cost Inventory.
 *
 * Loads configuration from SSM, runs an inventory and returns the JSON
 * report as the response body.
 */

import type { Context } from 'aws-lambda';
import { setupLogger } from '@shared/utils/logger';
import { loadConfigFromSsm, resolveInventoryOptions } from './core/config';
import { runInventory } from './core/inventory';
import { buildJsonReport } from './report';

const logger = setupLogger('cost-inventory:main');

// Default SSM parameter name (can be overridden via environment variable)
export const DEFAULT_CONFIG_PARAMETER = '/cost-inventory/config';

export const LAMBDA_REPORT_VERSION = '1.0.0';

/**
 * Lambda event structure. Every field overrides the stored configuration.
 */
export interface LambdaEvent {
  regions?: string;
  services?: string;
  no_cost?: boolean;
  [key: string]: unknown;
}

/**
 * Lambda response structure.
 */
export interface LambdaResponse {
  statusCode: number;
  body: string;
}

/**
 * Lambda handler function for Cloud Cost Inventory.
 *
 * @example
 * Event:
 * {
 *   "regions": "us-east-1,eu-west-1",
 *   "services": "ec2,ebs"
 * }
 *
 * Response:
 * {
 *   "statusCode": 200,
 *   "body": "{\"metadata\":{...},\"summary\":{...},\"cost_summary\":{...},...}"
 * }
 */
export async function main(event: LambdaEvent, context: Context): Promise<LambdaResponse> {
  const requestId = context.awsRequestId || 'local-test';
  const functionName = context.functionName || 'cost-inventory';

  logger.info(
    {
      regions: event.regions,
      services: event.services,
      requestId,
      functionName,
    },
    'Lambda invoked'
  );

  try {
    const configParameter = process.env.CONFIG_PARAMETER_NAME ?? DEFAULT_CONFIG_PARAMETER;
    const config = await loadConfigFromSsm(configParameter);

    const options = resolveInventoryOptions(config, {
      regions: event.regions,
      services: event.services,
      noCost: event.no_cost,
    });

    const result = await runInventory(options);
    const report = buildJsonReport(result, new Date(), LAMBDA_REPORT_VERSION);

    logger.info(
      {
        status: result.status,
        total: result.costSummary.overallTotal,
        errors: result.session.errors.length,
        requestId,
      },
      'Lambda execution completed successfully'
    );

    return {
      statusCode: 200,
      body: JSON.stringify(report),
    };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);

    logger.error(
      {
        error: errorMessage,
        requestId,
      },
      'Lambda execution failed'
    );

    return {
      statusCode: 500,
      body: JSON.stringify({
        error: errorMessage,
        timestamp: new Date().toISOString(),
        request_id: requestId,
      }),
    };
  }
}
