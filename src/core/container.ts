/**
 * Dependency Injection Container
 * Layer: Core
 *
 * The single place where tokens are mapped to implementations.
 *
 *   - `reflect-metadata` must load first: tsyringe reads constructor
 *     parameter metadata written by the decorators.
 *   - `useValue` registers pre-built singletons: the logger, the shared axios
 *     instance, registry options and the frozen jurisdiction table.
 *   - `useClass` builds the class on resolve and injects its dependencies.
 *
 * Tests override TOKENS.RegistryClient (or TOKENS.HttpClient) after importing
 * this module; the last registration wins.
 */
import 'reflect-metadata';
import { container } from 'tsyringe';

import { config } from './config';
import { logger } from './logger';
import { TOKENS } from './types';

import { ControllerLookupService } from '@application/services/ControllerLookupService';
import {
  createJurisdictionTable,
  JurisdictionResolver,
} from '@application/services/JurisdictionResolver';
import type { RegistryOptions } from '@domain/interfaces/IRegistryClient';
import { createHttpClient } from '@infrastructure/http/httpClient';
import { OpenCorporatesRegistryClient } from '@infrastructure/registry/OpenCorporatesRegistryClient';
import jurisdictions from '@shared/data/jurisdictions.json';

container.register(TOKENS.Logger, { useValue: logger });
container.register(TOKENS.HttpClient, { useValue: createHttpClient() });
container.register<RegistryOptions>(TOKENS.RegistryOptions, {
  useValue: { apiToken: config.registry.apiToken },
});
container.register(TOKENS.JurisdictionTable, { useValue: createJurisdictionTable(jurisdictions) });

container.register(TOKENS.RegistryClient, { useClass: OpenCorporatesRegistryClient });
container.register(TOKENS.JurisdictionResolver, { useClass: JurisdictionResolver });
container.register(TOKENS.ControllerLookupService, { useClass: ControllerLookupService });

export { container };
