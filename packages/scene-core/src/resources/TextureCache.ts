import type { Image } from "../brushes.js";

/**
 * Backend-side table from image identity to an uploaded handle. Each image is
 * uploaded at most once; later lookups return the stored handle.
 */
export class TextureCache<THandle> {
  private handles = new Map<string, THandle>();
  private uploads = 0;
  private readonly upload: (image: Image) => THandle;

  constructor(upload: (image: Image) => THandle) {
    this.upload = upload;
  }

  getOrCreate(image: Image): THandle {
    const existing = this.handles.get(image.id);
    if (existing !== undefined) return existing;
    const handle = this.upload(image);
    this.handles.set(image.id, handle);
    this.uploads++;
    return handle;
  }

  has(image: Image): boolean {
    return this.handles.has(image.id);
  }

  get size(): number {
    return this.handles.size;
  }

  get uploadCount(): number {
    return this.uploads;
  }

  /** Drops one entry, returning its handle so the caller can release it. */
  evict(image: Image): THandle | undefined {
    const handle = this.handles.get(image.id);
    this.handles.delete(image.id);
    return handle;
  }

  clear(): THandle[] {
    const all = [...this.handles.values()];
    this.handles.clear();
    return all;
  }
}
