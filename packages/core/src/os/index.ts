/**
 * OS Module - Operating System Detection
 */

export { OSDetector } from './detector.js';
export { OperatingSystem, Architecture } from '../types/common.js';
export type { SystemInfo } from '../types/common.js';
