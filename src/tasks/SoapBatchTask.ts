/**
 * soap_batch task: many soap_request parameter sets, run sequentially or in
 * parallel. Every item is validated before the first one is sent.
 */

import { BatchExecutor } from '../soap/BatchExecutor.js';
import { SoapClient } from '../soap/SoapClient.js';
import { SoapBatchParamsSchema, parseParams } from './params.js';
import { describeRequest, toRequestOutput, toRequestSpec, type SoapRequestOutput } from './SoapRequestTask.js';

export interface BatchTaskOptions {
  checkMode?: boolean;
  client?: SoapClient;
}

export interface SoapBatchOutput {
  success: boolean;
  changed: boolean;
  results: SoapRequestOutput[];
  total: number;
  succeeded: number;
  failed: number;
  cancelled: number;
  check_mode?: boolean;
}

/**
 * Run the soap_batch task.
 *
 * @throws PreconditionError for an invalid parameter set, before any request
 */
export async function runSoapBatch(params: unknown, options: BatchTaskOptions = {}): Promise<SoapBatchOutput> {
  const validated = parseParams(SoapBatchParamsSchema, params, 'soap_batch');
  const specs = validated.requests.map(toRequestSpec);
  const client = options.client ?? new SoapClient();

  if (options.checkMode) {
    const results = specs.map((spec) => describeRequest(spec, client));
    const failed = results.filter((result) => !result.success).length;
    return {
      success: failed === 0,
      changed: false,
      results,
      total: results.length,
      succeeded: 0,
      failed,
      cancelled: 0,
      check_mode: true,
    };
  }

  const batch = await new BatchExecutor(client).run({
    requests: specs,
    mode: validated.parallel ? 'parallel' : 'sequential',
    maxWorkers: validated.max_workers,
    deadlineMs: validated.batch_timeout === undefined ? undefined : Math.round(validated.batch_timeout * 1000),
    stopOnError: validated.stop_on_error,
  });

  return {
    success: batch.failed === 0,
    changed: batch.succeeded > 0,
    results: batch.results.map(toRequestOutput),
    total: batch.total,
    succeeded: batch.succeeded,
    failed: batch.failed,
    cancelled: batch.cancelled,
  };
}
