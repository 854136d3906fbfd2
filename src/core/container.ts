/**
 * Dependency Injection Container
 * Layer: Core
 *
 * The one place where tokens meet implementations. No class ever does
 * `new ItunesClient(...)` by hand outside tests; swapping the transport (a
 * proxy-aware fetch, a recording fake) is a one-line change here.
 *
 *   - `reflect-metadata` must be imported first so tsyringe can read the
 *     constructor parameter metadata its decorators store.
 *   - `useValue` registers pre-built singletons (logger, transport, options).
 *   - `useClass` builds the class on resolve, injecting its own dependencies.
 */
import 'reflect-metadata';
import { container } from 'tsyringe';

import { config } from './config';
import { logger } from './logger';
import { TOKENS } from './types';

import { CatalogService } from '@application/services/CatalogService';
import { fetchTransport } from '@infrastructure/http/fetchTransport';
import { ItunesClient } from '@infrastructure/itunes/ItunesClient';
import type { ItunesClientOptions } from '@infrastructure/itunes/ItunesClient';

container.register(TOKENS.Logger, { useValue: logger });
container.register(TOKENS.HttpTransport, { useValue: fetchTransport });
container.register<ItunesClientOptions>(TOKENS.ItunesClientOptions, {
  useValue: { ...config.itunes },
});
container.register(TOKENS.ItunesClient, { useClass: ItunesClient });
container.register(TOKENS.CatalogService, { useClass: CatalogService });

export { container };
