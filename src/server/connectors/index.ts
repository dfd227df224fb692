/**
 * Data source registry
 *
 * Each entry describes how to configure, validate and construct one kind of
 * data source.
 */

import type { ConfigField } from '../contracts/types.js';
import type { BaseDataSource } from './BaseDataSource.js';
import {
  BASECAMP_CONFIG_FIELDS,
  validateBasecampConfig,
  type BasecampConfig,
  type ValidateConfigOptions,
} from './basecamp/BasecampConfig.js';
import { BasecampDataSource, type BasecampDataSourceDependencies } from './basecamp/BasecampDataSource.js';

export interface DataSourceDefinition<TConfig, TDeps> {
  name: string;
  displayName: string;
  configFields: readonly ConfigField[];
  validateConfig(raw: unknown, options?: ValidateConfigOptions): Promise<TConfig>;
  create(dataSourceId: string, config: TConfig, deps: TDeps): BaseDataSource<TConfig>;
}

export const basecampDataSourceDefinition: DataSourceDefinition<BasecampConfig, BasecampDataSourceDependencies> = {
  name: 'basecamp',
  displayName: 'Basecamp',
  configFields: BASECAMP_CONFIG_FIELDS,
  validateConfig: validateBasecampConfig,
  create: (dataSourceId, config, deps) => new BasecampDataSource(dataSourceId, config, deps),
};

export const dataSourceRegistry = {
  basecamp: basecampDataSourceDefinition,
} as const;

export type DataSourceName = keyof typeof dataSourceRegistry;

export { BaseDataSource } from './BaseDataSource.js';
export type { DataSourceDependencies } from './BaseDataSource.js';
export { BasecampDataSource } from './basecamp/BasecampDataSource.js';
export type { BasecampDataSourceDependencies } from './basecamp/BasecampDataSource.js';
export { BasecampDocumentBuilder } from './basecamp/BasecampDocumentBuilder.js';
export type { BuildContext } from './basecamp/BasecampDocumentBuilder.js';
export {
  BASECAMP_CONFIG_FIELDS,
  basecampConfigSchema,
  parseBasecampConfig,
  validateBasecampConfig,
} from './basecamp/BasecampConfig.js';
export type { BasecampConfig, ValidateConfigOptions } from './basecamp/BasecampConfig.js';
