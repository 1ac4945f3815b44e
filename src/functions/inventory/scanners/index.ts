/**
 * Scanners module - exports scanner types, implementations and the factory.
 */

export type { RegionScanner, ScannerContext } from './base';
export { BaseScanner } from './base';

export { ComputeScanner } from './compute';
export { BlockVolumeScanner } from './blockVolume';
export { ObjectStoreScanner, regionFromLocationConstraint } from './objectStore';
export { FloatingIpScanner } from './floatingIp';
export { SnapshotScanner } from './snapshot';

export { getScanner } from './factory';
export { SCAN_ABORTED, describeProviderError, isRecoverableErrorCode, toScanError } from './errors';
