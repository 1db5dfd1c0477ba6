export { cors, type CorsOptions } from './cors'
export { helmet, SECURITY_HEADERS } from './helmet'
export { logger, type LoggerOptions } from './logger'
export { rateLimit, type RateLimitOptions } from './rate-limit'
export { requestId, type RequestIdOptions } from './request-id'
export { responseTime } from './response-time'
export { timeout } from './timeout'
