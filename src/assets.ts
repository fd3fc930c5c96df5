/**
 * `led-console assets`: interactive asset manager
 *
 * Lists the saved sprites and glyph overrides in the data directory and
 * deletes a sprite or resets a glyph after confirmation.
 */

import * as p from '@clack/prompts';
import type { ConsoleOptions } from './config';
import type { Glyph } from './grid/ledGrid';
import { type AssetStores, type FontStore, type SpriteStore, openAssetStores } from './storage';

// ---------------------------------------------------------------------------
// Listings
// ---------------------------------------------------------------------------

/** One line per sprite: name, size and lit pixel count */
export function describeSprites(store: SpriteStore): string[] {
  return store.names().map(name => {
    const sprite = store.get(name);
    if (!sprite) return name;
    return `${name.padEnd(24)} ${sprite.w}x${sprite.h}  ${sprite.size} px`;
  });
}

/** Glyph rows drawn with # for lit cells */
export function glyphPreview(glyph: Glyph): string[] {
  return glyph.map(row => row.map(cell => (cell ? '#' : '.')).join(''));
}

/** Overridden characters side by side with their glyphs */
export function describeGlyphs(store: FontStore): string[] {
  const overrides = store.getOverrides();
  const chars = Object.keys(overrides).sort();
  if (chars.length === 0) return [];

  const lines = [chars.map(c => `'${c}'`.padEnd(5)).join(' ')];
  for (let row = 0; row < 5; row++) {
    lines.push(chars.map(c => glyphPreview(overrides[c])[row].padEnd(5)).join(' '));
  }
  return lines;
}

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

function saveStore(save: () => void, what: string): void {
  try {
    save();
    p.log.success(`Saved ${what}`);
  } catch (err) {
    p.log.error(`Could not save ${what}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

async function deleteSprite(stores: AssetStores): Promise<void> {
  const names = stores.sprites.names();
  if (names.length === 0) {
    p.log.warn('No sprites saved.');
    return;
  }

  const selected = await p.select({
    message: 'Which sprite do you want to delete?',
    options: names.map(name => ({ value: name, label: name })),
  });
  if (p.isCancel(selected)) return;

  const confirmed = await p.confirm({ message: `Delete sprite "${selected}"?` });
  if (p.isCancel(confirmed) || !confirmed) return;

  stores.sprites.delete(selected);
  saveStore(() => stores.sprites.save(), stores.sprites.path);
}

async function resetGlyph(stores: AssetStores): Promise<void> {
  const chars = Object.keys(stores.fonts.getOverrides()).sort();
  if (chars.length === 0) {
    p.log.warn('No glyph overrides saved.');
    return;
  }

  const selected = await p.select({
    message: 'Which glyph do you want to reset to the built-in font?',
    options: chars.map(char => ({ value: char, label: `'${char}'` })),
  });
  if (p.isCancel(selected)) return;

  const confirmed = await p.confirm({ message: `Reset glyph '${selected}'?` });
  if (p.isCancel(confirmed) || !confirmed) return;

  stores.fonts.clearGlyph(selected);
  saveStore(() => stores.fonts.save(), stores.fonts.path);
}

// ---------------------------------------------------------------------------
// Entry point, called from cli.ts
// ---------------------------------------------------------------------------

export async function assetsCommand(options: ConsoleOptions): Promise<void> {
  p.intro('led-console assets');

  const stores = openAssetStores(options.dataDir);

  for (;;) {
    const action = await p.select({
      message: 'What would you like to do?',
      options: [
        { value: 'sprites', label: 'List sprites', hint: `${stores.sprites.names().length} saved` },
        { value: 'glyphs', label: 'List glyph overrides' },
        { value: 'delete', label: 'Delete a sprite' },
        { value: 'reset', label: 'Reset a glyph' },
        { value: 'exit', label: 'Exit' },
      ],
    });

    if (p.isCancel(action) || action === 'exit') break;

    if (action === 'sprites') {
      const lines = describeSprites(stores.sprites);
      p.note(lines.length > 0 ? lines.join('\n') : 'No sprites saved.', 'Sprites');
    }
    if (action === 'glyphs') {
      const lines = describeGlyphs(stores.fonts);
      p.note(lines.length > 0 ? lines.join('\n') : 'No glyph overrides saved.', 'Glyphs');
    }
    if (action === 'delete') await deleteSprite(stores);
    if (action === 'reset') await resetGlyph(stores);
  }

  p.outro('Done.');
}
