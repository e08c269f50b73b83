export * from './contracts'
export * from './counting/types'
export { FileScanner } from './counting/FileScanner'
export { LocCounter } from './counting/LocCounter'
export { RECOGNIZED_EXTENSIONS, isRecognizedFile } from './counting/extensions'
export { SessionManager } from './session/SessionManager'
export type { Clock, SessionManagerOptions, BeginSessionResult } from './session/SessionManager'
export type { Storage } from './storage/Storage'
export { FileStorage } from './storage/FileStorage'
export { MemoryStorage } from './storage/MemoryStorage'
export { ConfigLoader } from './config/ConfigLoader'
export { SessionError, CounterError, SESSION_ERROR_CODES } from './errors/SessionError'
export type { SessionErrorCode } from './errors/SessionError'
