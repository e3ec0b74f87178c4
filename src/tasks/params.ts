/**
 * Task parameter schemas
 *
 * Callers hand over snake_case parameter sets; these schemas validate them,
 * apply defaults and report every violation at once. Durations are seconds
 * here and milliseconds everywhere below the task layer.
 */

import { z } from 'zod';
import { PreconditionError } from '../errors.js';
import type { BodyTree, BodyValue } from '../soap/BodyTree.js';

// ============================================================================
// Common Schemas
// ============================================================================

const BodyValueSchema: z.ZodType<BodyValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(BodyValueSchema), z.record(BodyValueSchema)])
);

export const BodyTreeSchema: z.ZodType<BodyTree> = z.record(BodyValueSchema);

/** YAML readers turn `1.1` into a number */
const SoapVersionSchema = z.preprocess(
  (value) => (typeof value === 'number' ? value.toFixed(1) : value),
  z.enum(['1.1', '1.2']).default('1.2')
);

export const AuthTypeSchema = z.enum(['none', 'basic', 'digest', 'ntlm', 'certificate']);

const SecondsSchema = z.number().positive();

// ============================================================================
// soap_request
// ============================================================================

const RequestFieldsSchema = z.object({
  endpoint_url: z.string().url(),
  soap_action: z.string(),
  soap_version: SoapVersionSchema,
  body: z.string().optional(),
  body_dict: BodyTreeSchema.optional(),
  body_root_tag: z.string().min(1).optional(),
  namespace: z.string().optional(),
  namespace_prefix: z.string().min(1).optional(),
  soap_header: z.union([z.string(), z.array(z.string())]).optional(),
  headers: z.record(z.string()).default({}),
  auth_type: AuthTypeSchema.default('none'),
  username: z.string().optional(),
  password: z.string().optional(),
  domain: z.string().optional(),
  workstation: z.string().optional(),
  verify_ssl: z.boolean().default(true),
  client_cert: z.string().min(1).optional(),
  client_key: z.string().min(1).optional(),
  client_key_passphrase: z.string().optional(),
  timeout: SecondsSchema.optional(),
  max_retries: z.number().int().min(0).optional(),
  retry_delay: z.number().min(0).optional(),
  extract_path: z.string().min(1).optional(),
  strip_namespaces: z.boolean().default(false),
  return_raw: z.boolean().default(false),
});

type RequestFields = z.infer<typeof RequestFieldsSchema>;

function checkRequestFields(params: RequestFields, ctx: z.RefinementCtx): void {
  if (params.body !== undefined && params.body_dict !== undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['body'], message: 'body and body_dict are mutually exclusive' });
  }
  if (params.body === undefined && params.body_dict === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['body'], message: 'one of body or body_dict is required' });
  }
  if (params.body_dict !== undefined && params.body_root_tag === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['body_root_tag'],
      message: 'body_root_tag is required with body_dict',
    });
  }

  const needsPassword = params.auth_type === 'basic' || params.auth_type === 'digest' || params.auth_type === 'ntlm';
  if (needsPassword && (!params.username || !params.password)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['auth_type'],
      message: `username and password are required for auth_type ${params.auth_type}`,
    });
  }
  if (params.auth_type === 'certificate' && !params.client_cert) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['client_cert'],
      message: 'client_cert is required for auth_type certificate',
    });
  }
  if (params.client_key !== undefined && params.client_cert === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['client_key'], message: 'client_key requires client_cert' });
  }
}

export const SoapRequestParamsSchema = RequestFieldsSchema.strict().superRefine(checkRequestFields);

export type SoapRequestParams = z.infer<typeof SoapRequestParamsSchema>;

/** Raw parameters as a caller writes them */
export type SoapRequestInput = z.input<typeof SoapRequestParamsSchema>;

// ============================================================================
// soap_validate
// ============================================================================

export const SoapValidateParamsSchema = z
  .object({
    endpoint_url: z.string().min(1),
    timeout: SecondsSchema.optional(),
    verify_ssl: z.boolean().default(true),
    fetch_wsdl: z.boolean().default(false),
    wsdl_url: z.string().url().optional(),
    wsdl_suffix: z.string().min(1).optional(),
  })
  .strict();

export type SoapValidateParams = z.infer<typeof SoapValidateParamsSchema>;
export type SoapValidateInput = z.input<typeof SoapValidateParamsSchema>;

// ============================================================================
// soap_batch
// ============================================================================

export const SoapBatchParamsSchema = z
  .object({
    requests: z.array(RequestFieldsSchema.strict().superRefine(checkRequestFields)).min(1, 'requests must not be empty'),
    parallel: z.boolean().default(false),
    max_workers: z.number().int().min(1).optional(),
    stop_on_error: z.boolean().default(false),
    batch_timeout: SecondsSchema.optional(),
  })
  .strict();

export type SoapBatchParams = z.infer<typeof SoapBatchParamsSchema>;
export type SoapBatchInput = z.input<typeof SoapBatchParamsSchema>;

/**
 * Validate a parameter set.
 *
 * @throws PreconditionError listing every violation
 */
export function parseParams<S extends z.ZodTypeAny>(schema: S, params: unknown, task: string): z.infer<S> {
  const result = schema.safeParse(params);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new PreconditionError(`Invalid ${task} parameters: ${issues.join('; ')}`, issues);
  }
  return result.data;
}
