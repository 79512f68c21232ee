/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Every injectable dependency gets a unique Symbol so tsyringe can match a
 * consumer's @inject(...) to the registered implementation. Grouped by layer.
 */
export const TOKENS = {
  // Infrastructure
  Logger: Symbol.for('Logger'),
  HttpClient: Symbol.for('HttpClient'),
  RegistryOptions: Symbol.for('RegistryOptions'),

  // Registry access
  RegistryClient: Symbol.for('RegistryClient'),

  // Jurisdiction lookup
  JurisdictionTable: Symbol.for('JurisdictionTable'),
  JurisdictionResolver: Symbol.for('JurisdictionResolver'),

  // Services
  ControllerLookupService: Symbol.for('ControllerLookupService'),
} as const;
