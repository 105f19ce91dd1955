/**
 * speechgate - library entry point
 *
 * Capture side (AudioChannel, FrameAssembler), recognition backends,
 * credential tiers, fallback policy and the session orchestrator.
 */

export * from './shared/types';
export * from './main/audio';
export * from './main/transcription';
export * from './main/settings';
export { createLogger, type Logger, type LogLevel } from './main/utils/Logger';
