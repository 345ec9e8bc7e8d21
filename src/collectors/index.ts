/**
 * Built-in collectors.
 */

export { ProcessCollector, nodeProcessReadings } from './process-collector';
export type { ProcessCollectorConfig, ProcessReadings } from './process-collector';
