import { resolve } from 'path';
import { SpriteStore, SPRITES_FILE } from './spriteStore';
import { FontStore, FONT_FILE } from './fontStore';

export { Sprite, SpriteStore, drawSprite, SPRITES_FILE } from './spriteStore';
export { FontStore, FONT_FILE, coerceGlyph, copyGlyph, blankGlyph, GLYPH_ROWS, GLYPH_COLS } from './fontStore';

/** The persisted assets shared by screens and editors */
export interface AssetStores {
  sprites: SpriteStore;
  fonts: FontStore;
}

/** Open and load both stores under a data directory */
export function openAssetStores(dataDir: string): AssetStores {
  const sprites = new SpriteStore(resolve(dataDir, SPRITES_FILE));
  const fonts = new FontStore(resolve(dataDir, FONT_FILE));
  sprites.load();
  fonts.load();
  return { sprites, fonts };
}
