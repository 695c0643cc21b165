export * from './types.js';
export * from './constants.js';
export { FlightSuretyCore } from './flightSuretyCore.js';
export type { FlightSuretyCoreOptions } from './flightSuretyCore.js';
export { SuretyGateway } from './suretyGateway.js';
export { FlightStatus, isDelayStatus, isFlightStatusCode, statusName } from '../flight/flightStatus.js';
export type { FlightStatusCode, FlightStatusName } from '../flight/flightStatus.js';
export { FlightSuretyError, isFlightSuretyError } from '../errors/FlightSuretyError.js';
export type { FlightSuretyErrorCode } from '../errors/FlightSuretyError.js';
export { InMemoryValueTransfer } from '../ledger/transfers.js';
export type { ValueTransfer } from '../ledger/transfers.js';
export { HashIndexSource, SequenceIndexSource } from '../oracle/indexSource.js';
export type { IndexSource } from '../oracle/indexSource.js';
export { NotificationOutbox } from '../events/notifications.js';
export type { SuretyNotification, NotificationEnvelope } from '../events/notifications.js';
