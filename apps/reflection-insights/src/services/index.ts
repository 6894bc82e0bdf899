/**
 * Shared ReflectionAnalytics instance, created on first use
 */

import { ReflectionAnalytics } from './reflection-analytics';
import { getConfig, validateConfig } from '../utils/config';

let instance: ReflectionAnalytics | null = null;

export const getReflectionAnalytics = (): ReflectionAnalytics => {
  if (!instance) {
    const config = getConfig();
    validateConfig(config);
    instance = new ReflectionAnalytics(config);
  }
  return instance;
};

export const resetReflectionAnalytics = (): void => {
  instance = null;
};

export { ReflectionAnalytics };
