import { createLogger } from '@zettl/core';

export const logger = createLogger('migrations');
