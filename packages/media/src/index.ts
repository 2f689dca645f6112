/**
 * @audex/media
 * 
 * Media inspection layer: asks ffprobe about the streams of an input file.
 */

// Probing
export { FFProbe, type MediaInspector } from './probes/ffprobe.js';
