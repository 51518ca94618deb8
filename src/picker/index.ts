export { parseLines, readCandidates } from './input';
export type { CandidateSource } from './input';
export { clampSelection, moveSelection } from './selection';
export { PickerSession } from './session';
export type { PickerState, SessionOptions } from './session';
