/**
 * Engine Configuration
 *
 * Defaults for request, validation and batch parameters, read from the
 * environment once and cached. Explicit parameters always win over these.
 */

export interface EngineConfiguration {
  /** Per-request timeout (SOAP_DEFAULT_TIMEOUT_MS, default 30000) */
  defaultTimeoutMs: number;
  /** Reachability/WSDL probe timeout (SOAP_VALIDATE_TIMEOUT_MS, default 10000) */
  validateTimeoutMs: number;
  /** Retries for transient transport failures (SOAP_MAX_RETRIES, default 0) */
  maxRetries: number;
  /** First backoff delay, doubled on every retry (SOAP_RETRY_BASE_DELAY_MS, default 1000) */
  retryBaseDelayMs: number;
  /** Parallel batch worker count (SOAP_MAX_WORKERS, default 5) */
  maxWorkers: number;
  /** Appended to the endpoint URL to locate the WSDL (SOAP_WSDL_SUFFIX, default '?wsdl') */
  wsdlSuffix: string;
  /** User-Agent sent when the caller sets none (SOAP_USER_AGENT) */
  userAgent: string;
}

export const DEFAULT_USER_AGENT = 'soap-client-engine/0.1.0';

let cachedConfig: EngineConfiguration | null = null;

function parseNonNegativeInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseNonNegativeInt(value, fallback);
  return parsed > 0 ? parsed : fallback;
}

export function getEngineConfig(): EngineConfiguration {
  if (cachedConfig) return cachedConfig;

  const env = process.env;
  cachedConfig = {
    defaultTimeoutMs: parsePositiveInt(env['SOAP_DEFAULT_TIMEOUT_MS'], 30000),
    validateTimeoutMs: parsePositiveInt(env['SOAP_VALIDATE_TIMEOUT_MS'], 10000),
    maxRetries: parseNonNegativeInt(env['SOAP_MAX_RETRIES'], 0),
    retryBaseDelayMs: parseNonNegativeInt(env['SOAP_RETRY_BASE_DELAY_MS'], 1000),
    maxWorkers: parsePositiveInt(env['SOAP_MAX_WORKERS'], 5),
    wsdlSuffix: env['SOAP_WSDL_SUFFIX'] || '?wsdl',
    userAgent: env['SOAP_USER_AGENT'] || DEFAULT_USER_AGENT,
  };

  return cachedConfig;
}

/**
 * Reset cached configuration (for testing)
 */
export function resetEngineConfig(): void {
  cachedConfig = null;
}
