/**
 * SDK default constants.
 */

export const DEFAULT_BASE_URL = 'https://api.tenderly.co/api/v1';
export const DEFAULT_TIMEOUT = 30_000;
export const DASHBOARD_URL = 'https://dashboard.tenderly.co';
export const SDK_VERSION = '0.1.0';
export const USER_AGENT = `tenderkit-sdk/${SDK_VERSION}`;

export const ENV_ACCESS_KEY = 'TENDERLY_ACCESS_KEY';
export const ENV_ACCOUNT_SLUG = 'TENDERLY_ACCOUNT_SLUG';
export const ENV_PROJECT_SLUG = 'TENDERLY_PROJECT_SLUG';
export const ENV_API_URL = 'TENDERLY_API_URL';

export const RETRYABLE_STATUSES = [429, 500, 502, 503, 504];
