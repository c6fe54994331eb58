/**
 * Shared types for the framing pipeline.
 */

export type Orientation = 'landscape' | 'portrait' | 'square';

// Square sources have no parameter set
export type SupportedOrientation = Exclude<Orientation, 'square'>;

export interface Size {
  width: number;
  height: number;
}

/** Pixels removed from each edge of the source before scaling. */
export interface Margins {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export interface RgbaColor {
  r: number;
  g: number;
  b: number;
  alpha: number;
}

export interface OrientationSettings {
  framePath: string;
  margins: Margins;
  scaleFactor: number;
}

/**
 * Parameters for the image currently being framed. Built per image after
 * classification and passed explicitly through every stage.
 */
export interface OrientationParameters extends OrientationSettings {
  orientation: SupportedOrientation;
}

export interface GlobalSettings {
  inputPath: string;
  outputPath: string;
  debug: boolean;
  rotateToLandscape: boolean;
  landscape: OrientationSettings;
  portrait: OrientationSettings;
}
