// Export types (includes ConnectionState, ConnectionMetrics, etc.)
export * from './types';

// Export main class
export { MotorControl } from './motor/MotorControl';

// Export constants and helpers
export {
  DEFAULT_PORT,
  COMMAND_NAMES,
  EVENT_TYPES,
  LIMITS,
  ERROR_CODES,
  describeDeviceError,
  isHardwareErrorCode,
  encoderToPercent,
  percentToEncoder
} from './motor/MotorConstants';

// Export errors
export {
  MotorError,
  ValidationError,
  NotConnectedError,
  NotReadyError,
  CommandTimeoutError,
  CommandBusyError,
  DeviceError,
  ConnectionLostError,
  ConnectionFailedError,
  DecodeError,
  getDisconnectMessage
} from './utils/errors';

// Export configuration
export { resolveMotorOptions, optionsFromEnv, DEFAULT_OPTIONS } from './utils/config';

// Export low-level pieces (for advanced users)
export { MotorCommands } from './motor/MotorCommands';
export { MotorConnection } from './core/MotorConnection';
export { encodeCommand, decodeFrame, decodeCommand, LineFramer, InboundFrame } from './core/MotorProtocol';
export { TcpClient, MotorTransport, TransportEvents, TransportFactory } from './transport/TcpClient';

// Export error handling utilities (optional, for robustness)
export {
  setupGlobalErrorHandlers,
  setupBasicErrorProtection,
  isNetworkError,
  isRecoverableError,
  GlobalErrorHandlerOptions
} from './utils/errorHandling';
