import { classifyError } from "./classifier.js"
import { ExternalCallFailure } from "./errors.js"

/**
 * Run one external adapter call under a deadline.
 *
 * Any rejection (or the deadline passing) surfaces as ExternalCallFailure;
 * nothing is retried here, retry policy belongs to the turn boundary.
 */
export async function guardExternalCall<T>(
  operation: string,
  fn: () => Promise<T>,
  timeoutMs?: number,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined

  const call = (async () => fn())()
  const deadline =
    timeoutMs !== undefined && Number.isFinite(timeoutMs) && timeoutMs > 0
      ? new Promise<never>((_, reject) => {
          timer = setTimeout(() => {
            reject(
              new ExternalCallFailure(operation, `timed out after ${timeoutMs}ms`, {
                timedOut: true,
                retryable: true,
              }),
            )
          }, timeoutMs)
        })
      : undefined

  try {
    return await (deadline ? Promise.race([call, deadline]) : call)
  } catch (err) {
    if (err instanceof ExternalCallFailure) throw err
    const classification = classifyError(err)
    throw new ExternalCallFailure(operation, classification.message, {
      timedOut: classification.category === "TIMEOUT",
      retryable: classification.retryable,
      cause: err,
    })
  } finally {
    if (timer !== undefined) clearTimeout(timer)
  }
}
