import type { PipelineConfig } from '../config';
import type { ValidationRules } from '../validators/sql-validator';
import { AllowListRegistry } from './allow-list';
import { SchemaContextProvider } from './schema-context';

export { AllowListRegistry, parseAllowListOverride } from './allow-list';
export { SchemaContextProvider, extractHints, foldPlural } from './schema-context';

export interface SchemaSetup {
  allowList: AllowListRegistry;
  schema: SchemaContextProvider;
  rules: ValidationRules;
}

/** Allow-list, schema context and validator rules for one configuration. */
export function buildSchemaCatalog(config: PipelineConfig): SchemaSetup {
  const allowList = new AllowListRegistry(config.allowList);
  const schema = new SchemaContextProvider(config.schema.objects, allowList, config.schema.maxChars);
  return {
    allowList,
    schema,
    rules: {
      allowList,
      catalog: schema,
      maxRows: config.sql.maxRows,
      maxSubqueryDepth: config.sql.maxSubqueryDepth,
      bannedKeywords: config.sql.bannedKeywords,
      bannedFunctionPrefixes: config.sql.bannedFunctionPrefixes,
      defaultSchema: config.database.defaultSchema,
    },
  };
}
