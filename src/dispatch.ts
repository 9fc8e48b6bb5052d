/**
 * Dispatch composition
 * Builds a DispatchEngine from validated configuration.
 */

import type { Logger } from "pino"
import { RateLimiter } from "./adapters/channels/rate-limiter"
import { resolveDispatchConfig, type DispatchConfigInput } from "./config"
import type { SendCapability } from "./core/ports/send-capability"
import type { ThrottlePort } from "./core/ports/throttle"
import { DispatchEngine } from "./core/services/dispatch-engine"
import { SendRetryPolicy } from "./core/services/send-retry-policy"

export interface DispatchDependencies {
  sendCapability: SendCapability
  logger: Logger
  /** Shared gate; defaults to a RateLimiter built from `rateLimit`. */
  throttle?: ThrottlePort
}

/**
 * Throws ConfigurationError before anything is sent when the configuration is invalid
 */
export function createDispatchEngine(input: DispatchConfigInput, deps: DispatchDependencies): DispatchEngine {
  const config = resolveDispatchConfig(input)

  const throttle =
    deps.throttle ??
    new RateLimiter({
      maxSends: config.rateLimit.maxSends,
      windowMs: config.rateLimit.windowMs,
      logger: deps.logger.child({ component: "rate-limiter" }),
    })

  return new DispatchEngine({
    sendCapability: deps.sendCapability,
    throttle,
    retryPolicy: new SendRetryPolicy(config.retry),
    logger: deps.logger,
    workers: config.workers,
    failureLogSize: config.failureLogSize,
  })
}
