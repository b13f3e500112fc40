/**
 * Main entry point - exports all public APIs
 */

export { ProtocolKernel } from './kernel';
export type { KernelOptions } from './kernel';
export * from './compiler';
export * from './runtime';
export {
    InMemoryDeviceRegistry,
    DeviceRegistryError,
    registryFromDocument,
    loadDeviceRegistry,
    isNotFound,
    FEED_ARG,
} from './device_registry';
export type { DeviceRegistry, DeviceSpec, DeviceClass, AxisSpec, ParameterSpec, Range, NotFound } from './device_registry';
export {
    createDiagnostic,
    createFaultReport,
    formatDiagnostic,
    kindOf,
    isErrorCode,
    CommonRecoveryOptions,
} from './structured_error';
export type {
    Diagnostic,
    ErrorCode,
    ErrorKind,
    FaultReport,
    RecoveryOption,
    Result,
    RunStatus,
    Severity,
} from './structured_error';
export { createLogger, setCorrelation, clearCorrelation, currentCorrelation } from './logger';
export type { Logger, LogLevel, RunContext } from './logger';
export { SchemaValidator } from './schema_validator';
export type { ValidationResult, ValidationError, JsonSchema } from './schema_validator';
