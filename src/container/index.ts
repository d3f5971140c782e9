/**
 * @fileoverview Composes the application's dependency injection container.
 * Registration order matters: tools resolve the STRING services lazily, but
 * the server factory expects configuration to be present.
 * @module src/container/index
 */
import 'reflect-metadata';

import type { AppConfig } from '@/config/index.js';
import { registerCoreServices } from './registrations/core.js';
import { registerMcpServices } from './registrations/mcp.js';

let isContainerComposed = false;

/**
 * Registers every service. Safe to call more than once; later calls are
 * no-ops unless `appConfig` is given, in which case core services are
 * re-registered with it.
 */
export function composeContainer(appConfig?: AppConfig): void {
  if (isContainerComposed && !appConfig) {
    return;
  }
  registerCoreServices(appConfig);
  registerMcpServices();
  isContainerComposed = true;
}
