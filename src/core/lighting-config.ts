export interface LightingConfig {
  /** 0 = light from +x, 90 = light from +y */
  azimuthDeg: number;
  /** 0 = grazing, 90 = straight overhead */
  elevationDeg: number;
  intensity: number;
}

export const DEFAULT_LIGHTING: LightingConfig = {
  azimuthDeg: 45,
  elevationDeg: 60,
  intensity: 0.8,
};
