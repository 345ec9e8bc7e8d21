/**
 * Label utilities: name validation and canonical label sets.
 */

export {
  isValidLabelName,
  isValidMetricName,
  validateLabelNames,
  validateMetricName,
  RESERVED_LABEL_NAMES,
} from './validation';
export { LabelSet, createLabelKey } from './label-set';
