import { DEFAULT_PROBE_CONCURRENCY, type ConnectionFactory, type ConnectionTestResult } from '../../core/connection-factory.js';
import { ValidationError } from '../../core/errors.js';
import { silentLogger, type Logger } from '../../core/logger.js';
import type { EndpointDescriptor, TextSink } from '../../types/index.js';
import { ExecutionCoordinator } from '../execution/execution-coordinator.js';
import type { QueryOutcome } from '../execution/types/execution.types.js';
import { createRenderSession, ResultRenderer, type OutputMode } from '../render/result-renderer.js';
import {
  formatConnectionResults,
  formatProbeWarning,
  formatRunHeader,
  formatValidationResult
} from '../report/diagnostics.js';
import { StatementClassifier } from '../validation/statement-classifier.js';
import type { ValidationOutcome } from '../validation/types/validation.types.js';

export type RunConnections = Pick<ConnectionFactory, 'open' | 'testAllConnections'>;

export interface RunRequest {
  query: string;
  queryLabel: string;
  endpoints: readonly EndpointDescriptor[];
  csvOutput: boolean;
  verbose: boolean;
  batch: boolean;
  probeConcurrency?: number;
}

export interface RunReport {
  validation: ValidationOutcome;
  probes: ConnectionTestResult[];
  outcomes: QueryOutcome[];
}

interface RunServiceDependencies {
  connections: RunConnections;
  output: TextSink;
  diagnostics: TextSink;
  logger?: Logger;
  classifier?: StatementClassifier;
  renderer?: ResultRenderer;
}

/**
 * One invocation end to end: validate, probe, drop unreachable endpoints,
 * execute on the rest and render. Rendered results go to `output`, progress
 * and reports to `diagnostics`.
 */
export class RunService {
  private readonly connections: RunConnections;
  private readonly output: TextSink;
  private readonly diagnostics: TextSink;
  private readonly logger: Logger;
  private readonly classifier: StatementClassifier;
  private readonly renderer: ResultRenderer;
  private readonly coordinator: ExecutionCoordinator;

  constructor(dependencies: RunServiceDependencies) {
    this.connections = dependencies.connections;
    this.output = dependencies.output;
    this.diagnostics = dependencies.diagnostics;
    this.logger = dependencies.logger ?? silentLogger;
    this.classifier = dependencies.classifier ?? new StatementClassifier();
    this.renderer = dependencies.renderer ?? new ResultRenderer();
    this.coordinator = new ExecutionCoordinator({
      connections: this.connections,
      classifier: this.classifier,
      logger: this.logger.child('EXEC')
    });
  }

  async run(request: RunRequest): Promise<RunReport> {
    const validation = this.classifier.validate(request.query);
    this.diagnostics.write(formatValidationResult(validation, request.verbose));
    if (!validation.isValid) {
      throw new ValidationError('Query validation failed. Only SELECT statements are allowed.', validation.errorMessage);
    }

    const probes = await this.connections.testAllConnections(
      request.endpoints,
      request.probeConcurrency ?? DEFAULT_PROBE_CONCURRENCY
    );
    this.diagnostics.write(formatConnectionResults(probes, request.verbose));

    const reachableIds = new Set(probes.filter((probe) => probe.success).map((probe) => probe.endpointId));
    const failedCount = probes.length - reachableIds.size;
    if (failedCount > 0) {
      this.logger.warn(`${failedCount} endpoint(s) unreachable, excluded from execution`);
      this.diagnostics.write(formatProbeWarning(failedCount, request.verbose));
    }

    const reachable = request.endpoints.filter((endpoint) => reachableIds.has(endpoint.id));
    this.diagnostics.write(formatRunHeader(request.queryLabel, reachable.length));

    const mode: OutputMode = request.csvOutput ? 'csv' : 'table';
    const outcomes = request.batch
      ? await this.executeBatch(request.query, reachable, mode)
      : await this.executeStreaming(request.query, reachable, mode);

    this.diagnostics.write('Query execution complete!\n');
    return { validation, probes, outcomes };
  }

  private async executeStreaming(
    query: string,
    endpoints: readonly EndpointDescriptor[],
    mode: OutputMode
  ): Promise<QueryOutcome[]> {
    const session = createRenderSession();
    const outcomes: QueryOutcome[] = [];
    await this.coordinator.run(query, endpoints, (outcome) => {
      outcomes.push(outcome);
      this.reportCsvFailure(outcome, mode);
      this.output.write(this.renderer.renderOne(outcome, mode, session));
    });
    return outcomes;
  }

  private async executeBatch(
    query: string,
    endpoints: readonly EndpointDescriptor[],
    mode: OutputMode
  ): Promise<QueryOutcome[]> {
    const outcomes = await this.coordinator.runBatch(query, endpoints);
    outcomes.forEach((outcome) => this.reportCsvFailure(outcome, mode));
    this.output.write(this.renderer.renderBatch(outcomes, mode));
    return outcomes;
  }

  // CSV output has no row for a failed endpoint
  private reportCsvFailure(outcome: QueryOutcome, mode: OutputMode): void {
    if (mode === 'csv' && !outcome.success) {
      this.logger.warn(`[${outcome.endpointId}] ✗ ${outcome.errorMessage}`);
    }
  }
}
