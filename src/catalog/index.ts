export { RuleCatalog, defaultCatalog, CountryProfileDefinitionSchema } from './RuleCatalog';
export type { CountryProfileDefinition } from './RuleCatalog';
