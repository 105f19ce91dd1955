/**
 * Audio Module
 *
 * The capture-side hand-off (AudioChannel, FrameAssembler) and the PCM/WAV
 * helpers shared with the backends.
 */

export { AudioChannel } from './AudioChannel';
export { FrameAssembler, type FrameAssemblerConfig } from './FrameAssembler';
export {
  calculateRms,
  computeLevelMeter,
  decodePcm16,
  decodeWav,
  encodePcm16Wav,
  frameDurationMs,
  truncateFrame,
} from './audioUtils';
