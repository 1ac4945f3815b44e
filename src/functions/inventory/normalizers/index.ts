/**
 * Normalizers module - one pure function per resource kind.
 */

export { normalizeCompute, runningHoursSince } from './compute';
export { normalizeBlockVolume } from './blockVolume';
export { normalizeObjectStore, type BucketRecord } from './objectStore';
export { normalizeFloatingIp, isAssociated } from './floatingIp';
export { normalizeSnapshot } from './snapshot';
