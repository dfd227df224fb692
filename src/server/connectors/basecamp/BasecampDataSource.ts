/**
 * BasecampDataSource - feeds Basecamp todos and their comments to the index queue
 *
 * A run lists projects once, then processes every project as its own unit:
 * list the project's todos, build one document tree per todo and enqueue it.
 *
 * - Failing to list projects fails the run; nothing is enqueued.
 * - A malformed todo (missing fields, bad timestamp) is skipped; the unit goes on.
 * - Any other unit failure ends that unit only.
 */

import type {
  FailedUnit,
  IngestionRunSummary,
  NormalizedDocument,
  SkippedRecord,
} from '../../contracts/types.js';
import { BasecampClient, type BasecampClientOptions } from '../../clients/BasecampClient.js';
import { isRecordError, toAppError } from '../../types/errors.js';
import { rawRecordId, type ProjectRef } from '../../validation/basecampSchemas.js';
import {
  documentsEnqueuedTotal,
  ingestionRunDuration,
  recordsSkippedTotal,
  unitsFailedTotal,
} from '../../utils/metrics.js';
import { BaseDataSource, type DataSourceDependencies } from '../BaseDataSource.js';
import { BasecampDocumentBuilder } from './BasecampDocumentBuilder.js';
import type { BasecampConfig } from './BasecampConfig.js';

export interface BasecampDataSourceDependencies extends DataSourceDependencies {
  /** Prebuilt client; otherwise one is created from the config */
  client?: BasecampClient;
  clientOptions?: BasecampClientOptions & { userAgentApp?: string; timeoutMs?: number };
  builder?: BasecampDocumentBuilder;
}

interface UnitProgress {
  enqueuedCount: number;
  skippedRecords: SkippedRecord[];
}

export class BasecampDataSource extends BaseDataSource<BasecampConfig> {
  readonly sourceName = 'basecamp';
  private readonly client: BasecampClient;
  private readonly builder: BasecampDocumentBuilder;

  constructor(dataSourceId: string, config: BasecampConfig, deps: BasecampDataSourceDependencies) {
    super(dataSourceId, config, deps);
    const options: NonNullable<BasecampDataSourceDependencies['clientOptions']> = deps.clientOptions ?? {};
    const { userAgentApp, timeoutMs, ...clientOptions } = options;
    this.client = deps.client ?? new BasecampClient(
      { ...config, userAgentApp, timeoutMs },
      { logger: this.logger, ...clientOptions }
    );
    this.builder = deps.builder ?? new BasecampDocumentBuilder();
  }

  async feedNewDocuments(): Promise<IngestionRunSummary> {
    const startedAt = Date.now();
    const runTimer = ingestionRunDuration.startTimer({ data_source: this.sourceName });
    this.logger.info('Feeding new documents with Basecamp');

    let projects: ProjectRef[];
    try {
      projects = await this.client.listProjects();
    } catch (error) {
      runTimer({ outcome: 'error' });
      this.logger.error({ error }, 'Failed to list Basecamp projects; aborting run');
      throw error;
    }

    const units: Array<{ project: ProjectRef; progress: UnitProgress }> = projects.map((project) => ({
      project,
      progress: { enqueuedCount: 0, skippedRecords: [] },
    }));

    const outcomes = await this.runUnits(
      units,
      ({ project }) => `project:${project.id}`,
      ({ project, progress }, signal) => this.feedProject(project, progress, signal)
    );

    const failedUnits: FailedUnit[] = [];
    outcomes.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        return;
      }
      const project = projects[index];
      const error = toAppError(outcome.reason);
      unitsFailedTotal.inc({ data_source: this.sourceName, reason: error.code });
      this.logger.error(
        { error: outcome.reason, projectId: project.id, projectName: project.name },
        'Failed to ingest Basecamp project'
      );
      failedUnits.push({
        projectId: String(project.id),
        projectName: project.name,
        code: error.code,
        message: error.message,
      });
    });

    const summary: IngestionRunSummary = {
      dataSourceId: this.dataSourceId,
      projectCount: projects.length,
      enqueuedCount: units.reduce((total, unit) => total + unit.progress.enqueuedCount, 0),
      skippedRecords: units.flatMap((unit) => unit.progress.skippedRecords),
      failedUnits,
      durationMs: Date.now() - startedAt,
    };

    runTimer({ outcome: failedUnits.length > 0 ? 'partial' : 'success' });
    this.logger.info(
      {
        projectCount: summary.projectCount,
        enqueuedCount: summary.enqueuedCount,
        skippedCount: summary.skippedRecords.length,
        failedUnitCount: failedUnits.length,
        durationMs: summary.durationMs,
      },
      'Basecamp ingestion run finished'
    );
    return summary;
  }

  private async feedProject(project: ProjectRef, progress: UnitProgress, signal: AbortSignal): Promise<void> {
    this.logger.info({ projectId: project.id, projectName: project.name }, 'Getting todos from Basecamp project');

    const todos = await this.client.listTaskItems(project, { signal });

    for (const todo of todos) {
      signal.throwIfAborted();

      let document: NormalizedDocument;
      try {
        document = this.builder.build(todo, { dataSourceId: this.dataSourceId, location: project.name });
      } catch (error) {
        if (!isRecordError(error)) {
          throw error;
        }
        recordsSkippedTotal.inc({ data_source: this.sourceName, reason: error.code });
        this.logger.warn(
          { error, projectId: project.id, todoId: rawRecordId(todo) },
          'Skipping malformed Basecamp todo'
        );
        progress.skippedRecords.push({
          projectId: String(project.id),
          recordId: rawRecordId(todo),
          code: error.code,
          message: error.message,
        });
        continue;
      }

      await this.indexQueue.enqueue(document);
      progress.enqueuedCount += 1;
      documentsEnqueuedTotal.inc({ data_source: this.sourceName });
    }

    this.logger.debug(
      { projectId: project.id, enqueuedCount: progress.enqueuedCount, skippedCount: progress.skippedRecords.length },
      'Finished Basecamp project'
    );
  }
}
