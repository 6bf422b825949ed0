import fs from 'fs/promises';
import { z } from 'zod';
import { logger } from './logging';
import { CatalogTrack } from './types';

export interface Catalog {
  lookup(trackId: string): Promise<CatalogTrack | undefined>;
  list(): Promise<CatalogTrack[]>;
}

const ManifestEntrySchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String).pipe(z.string().min(1)),
  url: z.string().min(1),
  title: z.string().default('Unknown Title'),
  artist: z.string().default('Unknown Artist'),
  duration: z.number().nonnegative().default(0),
  thumbnail: z.string().optional()
});

// Entries that fail validation are skipped with a warning
export function parseManifest(raw: unknown): CatalogTrack[] {
  if (!Array.isArray(raw)) {
    throw new Error('Song manifest must be a JSON array');
  }

  const tracks: CatalogTrack[] = [];
  raw.forEach((item, i) => {
    const result = ManifestEntrySchema.safeParse(item);
    if (!result.success) {
      logger.warn(`Skipping manifest entry #${i}: ${result.error.issues[0]?.message ?? 'invalid'}`);
      return;
    }
    const { id, url, title, artist, duration, thumbnail } = result.data;
    tracks.push({ id, title, artist, duration, streamUrl: url, thumbnail });
  });
  return tracks;
}

export class ManifestCatalog implements Catalog {
  private readonly byId: Map<string, CatalogTrack>;

  constructor(private readonly tracks: CatalogTrack[]) {
    this.byId = new Map(tracks.map(t => [t.id, t]));
  }

  static async fromFile(manifestPath: string): Promise<ManifestCatalog> {
    const text = await fs.readFile(manifestPath, 'utf8');
    const tracks = parseManifest(JSON.parse(text));
    logger.info(`Loaded ${tracks.length} songs from ${manifestPath}`);
    return new ManifestCatalog(tracks);
  }

  async lookup(trackId: string): Promise<CatalogTrack | undefined> {
    return this.byId.get(trackId);
  }

  async list(): Promise<CatalogTrack[]> {
    return [...this.tracks];
  }
}
