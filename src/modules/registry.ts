import type { DiscoveredCamera } from '../types/index.js';

interface RegistryState {
  readonly cameras: readonly DiscoveredCamera[];
  readonly index: ReadonlyMap<string, DiscoveredCamera>;
}

export function cameraKey(host: string, port: number): string {
  return `${host}:${port}`;
}

/**
 * Published set of confirmed cameras. Readers get an immutable array;
 * `replace` swaps the whole state in one assignment so a reader sees either
 * the old set or the new one.
 */
export class CameraRegistry {
  private state: RegistryState = { cameras: Object.freeze([]), index: new Map() };

  snapshot(): readonly DiscoveredCamera[] {
    return this.state.cameras;
  }

  get(host: string, port: number): DiscoveredCamera | undefined {
    return this.state.index.get(cameraKey(host, port));
  }

  get size(): number {
    return this.state.cameras.length;
  }

  replace(cameras: Iterable<DiscoveredCamera>): void {
    const index = new Map<string, DiscoveredCamera>();
    for (const camera of cameras) {
      const key = cameraKey(camera.host, camera.port);
      if (index.has(key)) {
        throw new Error(`Duplicate camera identity ${key}`);
      }
      index.set(key, Object.freeze({ ...camera }));
    }

    const ordered = [...index.values()].sort(compareCameras);
    this.state = { cameras: Object.freeze(ordered), index };
  }
}

function compareCameras(a: DiscoveredCamera, b: DiscoveredCamera): number {
  if (a.discoveredAt !== b.discoveredAt) return a.discoveredAt < b.discoveredAt ? -1 : 1;
  if (a.host !== b.host) return a.host < b.host ? -1 : 1;
  return a.port - b.port;
}
