/**
 * Base HTTP Client
 *
 * Foundation for the blockchain API client:
 * - Request timeout handling
 * - Retry with exponential backoff on transport errors and 408/429/5xx
 * - Response bodies read under a byte limit
 * - Failures returned as `Result` values, never thrown
 */

import { TIMEOUTS } from '../../config'
import { type Result, ok, err } from '../../domain/types'
import { apiLogger } from '../../services/logger'

/**
 * HTTP client configuration options
 */
export interface HttpClientConfig {
  /** Base URL for all requests */
  baseUrl: string
  /** Request timeout in milliseconds */
  timeout: number
  /** Maximum attempts for a request, the first one included */
  maxRetries: number
  /** Initial retry delay in milliseconds */
  retryDelayMs: number
  /** Enable request/response logging */
  enableLogging: boolean
  /** Injected for tests; defaults to the global fetch */
  fetchImpl?: typeof fetch
}

export type HttpErrorCode = 'NETWORK_ERROR' | 'TIMEOUT' | 'HTTP_ERROR' | 'PARSE_ERROR' | 'RESPONSE_TOO_LARGE'

/**
 * HTTP error with status code and response details
 */
export interface HttpError {
  code: HttpErrorCode
  message: string
  status?: number
  url?: string
  retryable: boolean
}

export const DEFAULT_HTTP_CONFIG: HttpClientConfig = {
  baseUrl: '',
  timeout: TIMEOUTS.HTTP_REQUEST_MS,
  maxRetries: TIMEOUTS.HTTP_MAX_RETRIES,
  retryDelayMs: TIMEOUTS.HTTP_RETRY_DELAY_MS,
  enableLogging: true
}

/**
 * HTTP status codes that should trigger a retry
 */
const RETRYABLE_STATUS_CODES = [408, 429, 500, 502, 503, 504]

/**
 * Maximum response body size in bytes (10 MB), checked against the
 * declared Content-Length and while the body streams in
 */
export const MAX_RESPONSE_BODY_BYTES = 10 * 1024 * 1024

function createHttpError(
  code: HttpErrorCode,
  message: string,
  status?: number,
  url?: string,
  retryable = false
): HttpError {
  return { code, message, status, url, retryable }
}

function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUS_CODES.includes(status)
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

/**
 * Calculate exponential backoff delay with jitter
 */
function calculateBackoff(attempt: number, baseDelay: number): number {
  const exponentialDelay = baseDelay * Math.pow(2, attempt)
  const jitter = exponentialDelay * Math.random() * 0.5
  return exponentialDelay + jitter
}

/**
 * Decode a response body as UTF-8, giving up with `null` as soon as it is
 * known to exceed `limit` bytes.
 */
async function readTextWithin(response: Response, limit: number): Promise<string | null> {
  const declared = Number(response.headers.get('content-length'))
  if (declared > limit) {
    await response.body?.cancel()
    return null
  }
  if (!response.body) return ''

  const reader = response.body.getReader()
  const decoder = new TextDecoder()
  let received = 0
  let text = ''

  for (;;) {
    const { done, value } = await reader.read()
    if (done) break
    received += value.byteLength
    if (received > limit) {
      await reader.cancel()
      return null
    }
    text += decoder.decode(value, { stream: true })
  }

  return text + decoder.decode()
}

/**
 * Transport errors are any failure to get a response at all
 */
export function isTransportFailure(error: HttpError): boolean {
  return error.code === 'NETWORK_ERROR' || error.code === 'TIMEOUT'
}

export interface HttpClient {
  /** GET a JSON document */
  getJson(path: string): Promise<Result<unknown, HttpError>>

  /** POST a plain-text body and read a plain-text answer */
  postText(path: string, body: string): Promise<Result<string, HttpError>>
}

/**
 * Create an HTTP client instance
 */
export function createHttpClient(config: Partial<HttpClientConfig> = {}): HttpClient {
  const cfg: HttpClientConfig = { ...DEFAULT_HTTP_CONFIG, ...config }
  const doFetch = cfg.fetchImpl ?? fetch

  async function fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), cfg.timeout)

    try {
      return await doFetch(url, { ...init, signal: controller.signal })
    } finally {
      clearTimeout(timeoutId)
    }
  }

  function log(message: string): void {
    if (cfg.enableLogging) {
      apiLogger.debug(message)
    }
  }

  /**
   * Execute request with retry logic. Resolves with the last response,
   * whatever its status, or with a transport error.
   */
  async function executeWithRetry(path: string, init: RequestInit): Promise<Result<Response, HttpError>> {
    const method = init.method ?? 'GET'
    const url = `${cfg.baseUrl}${path}`
    const attempts = Math.max(1, cfg.maxRetries)
    let lastError: HttpError = createHttpError('NETWORK_ERROR', 'Request failed', undefined, url)

    for (let attempt = 0; attempt < attempts; attempt++) {
      const startTime = Date.now()
      try {
        log(`[HTTP] ${method} ${url}`)
        const response = await fetchWithTimeout(url, init)
        log(`[HTTP] ${method} ${url} -> ${response.status} (${Date.now() - startTime}ms)`)

        if (!response.ok && isRetryableStatus(response.status) && attempt < attempts - 1) {
          log(`[HTTP] ${method} ${url} retrying after ${response.status} (attempt ${attempt + 1})`)
          await sleep(calculateBackoff(attempt, cfg.retryDelayMs))
          continue
        }

        return ok(response)
      } catch (e) {
        const error = e instanceof Error ? e : new Error(String(e))
        lastError = createHttpError(
          error.name === 'AbortError' ? 'TIMEOUT' : 'NETWORK_ERROR',
          error.message,
          undefined,
          url,
          true
        )
        if (cfg.enableLogging) {
          apiLogger.warn(`[HTTP] ${method} ${url} failed after ${Date.now() - startTime}ms (attempt ${attempt + 1})`, {
            code: lastError.code,
            message: lastError.message
          })
        }

        if (attempt < attempts - 1) {
          await sleep(calculateBackoff(attempt, cfg.retryDelayMs))
        }
      }
    }

    return err(lastError)
  }

  /**
   * Read a successful response body, or turn a failed one into an error
   */
  async function readBody(path: string, response: Response): Promise<Result<string, HttpError>> {
    const url = `${cfg.baseUrl}${path}`
    let text: string | null
    try {
      text = await readTextWithin(response, MAX_RESPONSE_BODY_BYTES)
    } catch (e) {
      return err(createHttpError('NETWORK_ERROR', e instanceof Error ? e.message : String(e), response.status, url, true))
    }

    if (text === null) {
      return err(createHttpError(
        'RESPONSE_TOO_LARGE',
        `Response body exceeds ${MAX_RESPONSE_BODY_BYTES} bytes`,
        response.status,
        url
      ))
    }

    if (!response.ok) {
      return err(createHttpError(
        'HTTP_ERROR',
        text.trim() || `HTTP ${response.status}: ${response.statusText}`,
        response.status,
        url,
        isRetryableStatus(response.status)
      ))
    }

    return ok(text)
  }

  return {
    async getJson(path: string): Promise<Result<unknown, HttpError>> {
      const result = await executeWithRetry(path, { method: 'GET', headers: { Accept: 'application/json' } })
      if (!result.ok) return result

      const body = await readBody(path, result.value)
      if (!body.ok) return body

      try {
        const data: unknown = JSON.parse(body.value)
        return ok(data)
      } catch {
        return err(createHttpError('PARSE_ERROR', 'Failed to parse JSON response', result.value.status, `${cfg.baseUrl}${path}`))
      }
    },

    async postText(path: string, body: string): Promise<Result<string, HttpError>> {
      const result = await executeWithRetry(path, { method: 'POST', headers: { 'Content-Type': 'text/plain' }, body })
      if (!result.ok) return result

      return readBody(path, result.value)
    }
  }
}
