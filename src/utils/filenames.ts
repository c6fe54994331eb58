import path from 'path';
import { DebugStage, stageLabel } from '../processing/FramingPipeline';

export const FINAL_SUFFIX = '_framed';

export function snapshotSuffix(stage: DebugStage): string {
  return `_${stage}_${stageLabel(stage)}`;
}

export function finalSuffix(debug: boolean): string {
  return debug ? snapshotSuffix(DebugStage.FRAMED) : FINAL_SUFFIX;
}

/**
 * `photo.jpg` + `_framed` → `<outputDir>/photo_framed.jpg`
 */
export function outputPath(outputDir: string, filename: string, suffix: string): string {
  const { name, ext } = path.parse(filename);
  return path.join(outputDir, `${name}${suffix}${ext}`);
}
