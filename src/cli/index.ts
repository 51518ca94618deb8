export { createProgram, runCli, runPicker, VERSION } from './program';
export type { PickerCommandOptions, PickerIO } from './program';
