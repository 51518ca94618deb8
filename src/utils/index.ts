export { default as logger } from './logger';
export { PickerError } from './PickerError';
