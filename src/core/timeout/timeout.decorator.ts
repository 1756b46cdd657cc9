import { SetMetadata } from '@nestjs/common';

export const TIMEOUT_KEY = 'timeout';

/**
 * Request timeout in milliseconds, or the name of a config key holding it
 */
export const Timeout = (timeout: number | string) => SetMetadata(TIMEOUT_KEY, timeout);
