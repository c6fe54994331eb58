import { GlobalSettings, OrientationParameters, SupportedOrientation } from '../types';

export function resolveParameters(
  orientation: SupportedOrientation,
  settings: GlobalSettings
): OrientationParameters {
  const selected = orientation === 'landscape' ? settings.landscape : settings.portrait;

  return {
    orientation,
    framePath: selected.framePath,
    margins: { ...selected.margins },
    scaleFactor: selected.scaleFactor,
  };
}
