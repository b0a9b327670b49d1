import { randomUUID } from 'crypto';
import type { TestServices } from '../services/index.js';
import type { TestHubConfiguration } from '../types.js';

/** What every category factory is built from. */
export interface SuiteDependencies {
  services: TestServices;
  configuration: TestHubConfiguration;
}

/** A fresh address on the test domain, so new-user scenarios stay new. */
export function uniqueTestEmail(prefix = 'test'): string {
  return `${prefix}_${randomUUID().slice(0, 8)}@interspace.test`;
}
