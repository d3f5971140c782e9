/**
 * @fileoverview Registers configuration and STRING services with the container.
 * @module src/container/registrations/core
 */
import { container } from 'tsyringe';

import { getConfig, type AppConfig as AppConfigType } from '@/config/index.js';
import {
  AppConfig,
  Sleep,
  StringApiClient,
  StringClientConfig,
  StringDbService,
} from '@/container/tokens.js';
import {
  StringApiClient as StringApiClientClass,
  StringDbService as StringDbServiceClass,
  createStringConfig,
} from '@/services/string-db/index.js';
import { logger, sleep } from '@/utils/index.js';

export const registerCoreServices = (
  appConfig: AppConfigType = getConfig(),
): void => {
  container.register<AppConfigType>(AppConfig, { useValue: appConfig });
  container.register(StringClientConfig, {
    useValue: createStringConfig(appConfig.string),
  });
  container.register(Sleep, { useValue: sleep });

  // One client per process: the request throttle must be shared by every caller.
  container.registerSingleton(StringApiClient, StringApiClientClass);
  container.registerSingleton(StringDbService, StringDbServiceClass);

  logger.info('Core services registered with the DI container.');
};
