export enum ErrorCode {
  // Connectivity failures
  CONNECTION_TIMEOUT = 'CONNECTION_TIMEOUT',
  CONNECTION_UNREACHABLE = 'CONNECTION_UNREACHABLE',
  AUTH_REJECTED = 'AUTH_REJECTED',

  // Config store failures
  MISSING_KEY = 'MISSING_KEY',

  // Environment & document validation
  CONFIG_ERROR = 'CONFIG_ERROR',
}
