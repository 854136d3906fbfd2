/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Every injectable dependency gets a unique Symbol so the tsyringe container
 * knows "when someone asks for X, give them Y". Grouped by layer so the set
 * of seams is easy to scan; register a new token here before wiring it in
 * container.ts.
 */
export const TOKENS = {
  // Infrastructure
  Logger: Symbol.for('Logger'),
  HttpTransport: Symbol.for('HttpTransport'),
  ItunesClientOptions: Symbol.for('ItunesClientOptions'),

  // Clients
  ItunesClient: Symbol.for('ItunesClient'),

  // Services
  CatalogService: Symbol.for('CatalogService'),
} as const;
