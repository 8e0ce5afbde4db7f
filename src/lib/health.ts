/**
 * Server connectivity check
 */

import axios from 'axios';
import { getLogger } from '../utils/logger.js';
import { messageOf } from '../utils/errors.js';

const HEALTH_PATHS = ['/health', '/api/health', '/'];

export interface HealthCheckResult {
  reachable: boolean;
  /** URL that answered, if any */
  url?: string;
  statusCode?: number;
}

/**
 * Probe well-known health endpoints; any status below 500 counts as up
 */
export async function checkServer(
  serverUrl: string,
  timeoutMs: number = 10000
): Promise<HealthCheckResult> {
  const logger = getLogger();
  const baseUrl = serverUrl.replace(/\/+$/, '');

  for (const healthPath of HEALTH_PATHS) {
    const url = `${baseUrl}${healthPath}`;
    try {
      const response = await axios.get(url, {
        timeout: timeoutMs,
        validateStatus: () => true, // Accept any status
      });
      if (response.status < 500) {
        return { reachable: true, url, statusCode: response.status };
      }
      logger.debug(`Health probe ${url} answered ${response.status}`);
    } catch (error) {
      logger.debug(`Health probe ${url} failed`, { error: messageOf(error) });
    }
  }

  return { reachable: false };
}
