import { createLogger } from '../logger';
import { DealsApiClient, PATHS } from './client';
import { extractUsage } from './rateLimiter';
import { AccountInfoSchema } from './types';
import type { AccountInfo, ConnectionReport, DiagnosticResult, UsageSnapshot } from './types';

const logger = createLogger('diagnostics');

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function valueOrNull<T>(result: DiagnosticResult<T>): T | null {
  return result.status === 'ok' ? result.value : null;
}

/**
 * Best-effort connectivity probes. Nothing here throws: every failure becomes a
 * `failed` or `absent` result, and the boolean/nullable wrappers fold those together.
 */
export class ConnectionDiagnostics {
  constructor(private readonly client: DealsApiClient) {}

  async checkCredentials(accessToken: string): Promise<DiagnosticResult<true>> {
    const operation = 'validate_credentials';
    logger.info({ operation }, 'Validating credentials');
    try {
      const response = await this.client.executor.get(operation, PATHS.dealProperties, {
        accessToken,
        params: { limit: 1 },
      });
      if (response.status === 200) {
        logger.info({ operation }, 'Credentials validated');
        return { status: 'ok', value: true };
      }
      logger.warn({ operation, status_code: response.status }, 'Credential validation failed');
      return { status: 'failed', error: `Unexpected status ${response.status}` };
    } catch (err) {
      logger.error({ operation, err }, 'Credential validation error');
      return { status: 'failed', error: errorMessage(err) };
    }
  }

  async validateCredentials(accessToken: string): Promise<boolean> {
    const result = await this.checkCredentials(accessToken);
    return result.status === 'ok';
  }

  async fetchAccountInfo(accessToken: string): Promise<DiagnosticResult<AccountInfo>> {
    const operation = 'get_account_info';
    try {
      const response = await this.client.executor.get(operation, PATHS.accountInfo, { accessToken });
      if (response.status !== 200) return { status: 'absent' };

      const parsed = AccountInfoSchema.safeParse(response.data);
      if (!parsed.success) return { status: 'failed', error: parsed.error.message };

      logger.debug(
        { operation, portal_id: parsed.data.portalId, hub_domain: parsed.data.hubDomain },
        'Account info retrieved'
      );
      return { status: 'ok', value: parsed.data };
    } catch (err) {
      logger.debug({ operation, err }, 'Account info not available');
      return { status: 'failed', error: errorMessage(err) };
    }
  }

  async getAccountInfo(accessToken: string): Promise<AccountInfo | null> {
    return valueOrNull(await this.fetchAccountInfo(accessToken));
  }

  async fetchApiUsage(accessToken: string): Promise<DiagnosticResult<UsageSnapshot>> {
    const operation = 'get_api_usage';
    try {
      const response = await this.client.executor.get(operation, PATHS.dealProperties, {
        accessToken,
        params: { limit: 1 },
      });
      if (response.status !== 200) return { status: 'absent' };

      const usage = extractUsage(response.headers);
      if (!usage) return { status: 'absent' };

      logger.debug(
        {
          operation,
          daily_remaining: usage.headers['X-HubSpot-RateLimit-Daily-Remaining'],
          interval_remaining: usage.headers['X-HubSpot-RateLimit-Remaining'],
        },
        'API usage info retrieved'
      );
      return { status: 'ok', value: usage };
    } catch (err) {
      logger.warn({ operation, err }, 'Could not retrieve API usage');
      return { status: 'failed', error: errorMessage(err) };
    }
  }

  async getApiUsage(accessToken: string): Promise<UsageSnapshot | null> {
    return valueOrNull(await this.fetchApiUsage(accessToken));
  }

  async testConnection(accessToken: string): Promise<ConnectionReport> {
    const operation = 'test_connection';
    logger.info({ operation }, 'Testing API connection');

    let tokenValid = false;
    let dataAccessible = false;
    let accountInfo: AccountInfo | null = null;
    let usageInfo: UsageSnapshot | null = null;
    let error: string | null = null;

    try {
      tokenValid = await this.validateCredentials(accessToken);

      if (tokenValid) {
        accountInfo = await this.getAccountInfo(accessToken);
        usageInfo = await this.getApiUsage(accessToken);

        try {
          await this.client.getDeals(accessToken, { limit: 1 });
          dataAccessible = true;
          logger.info({ operation, token_valid: tokenValid, data_accessible: dataAccessible }, 'Connection test successful');
        } catch (err) {
          logger.warn({ operation, err }, 'Data access test failed');
        }
      } else {
        logger.warn({ operation }, 'Connection test failed: invalid token');
      }
    } catch (err) {
      error = errorMessage(err);
      logger.error({ operation, err }, 'Connection test error');
    }

    return Object.freeze({
      tokenValid,
      apiReachable: tokenValid,
      dataAccessible,
      accountInfo,
      usageInfo,
      error,
    });
  }
}
