// Named color swatches offered by the editor. The renderer never reads them.

export interface Palette {
  name: string;
  /** `#rrggbb` strings */
  colors: string[];
}

export const FROST_PALETTE: Palette = {
  name: 'frost',
  colors: ['#000814', '#0a1628', '#1a2e45', '#caf0f8', '#64ffda', '#4ecdc4'],
};
