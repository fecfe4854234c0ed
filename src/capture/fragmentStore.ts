/**
 * Writes intercepted HLS fragments to a temp directory in arrival order.
 */
import { basename, join } from "node:path";
import { writeFile } from "../shared/fs.js";
import { getPathname } from "../shared/url.js";
import { errorMessage, silentLogger, type Logger } from "../shared/logger.js";

export interface Fragment {
  /** Local capture order, used for reassembly */
  index: number;
  url: string;
  /** Sequence number parsed from the URL, or the index when absent */
  sequence: number;
  size: number;
  path: string;
}

export type BodyReader = () => Promise<Uint8Array>;

const SEQUENCE_PATTERN = /(?:media|seg|frag|chunk)[-_](\d+)/i;

/**
 * Extracts the segment sequence number from a fragment URL.
 */
export function parseSequenceNumber(url: string, fallback: number): number {
  const match = SEQUENCE_PATTERN.exec(getPathname(url));
  return match?.[1] ? parseInt(match[1], 10) : fallback;
}

export interface FragmentStoreOptions {
  logger?: Logger;
  /** Media seconds per fragment, for the resume hint */
  segmentSeconds?: number;
}

export class FragmentStore {
  private readonly seen = new Set<string>();
  private readonly written: Fragment[] = [];
  private readonly writes: Promise<void>[] = [];
  private readonly logger: Logger;
  private readonly segmentSeconds: number;
  private arrivals = 0;
  private highestSequence = -1;
  private sealed = false;
  private keepBelow = Number.POSITIVE_INFINITY;

  constructor(
    readonly dir: string,
    options: FragmentStoreOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.segmentSeconds = options.segmentSeconds ?? 10;
  }

  /**
   * Handles one network response. Returns true when it was accepted as a
   * new fragment. The capture index is assigned synchronously so order
   * follows arrival even when writes finish out of order.
   */
  observe(url: string, readBody: BodyReader): boolean {
    if (this.sealed || this.seen.has(url)) {
      return false;
    }

    const pathname = getPathname(url);
    if (pathname.endsWith(".m3u8")) {
      this.seen.add(url);
      return false;
    }
    if (!pathname.endsWith(".ts")) {
      return false;
    }

    this.seen.add(url);
    const index = this.arrivals++;
    const sequence = parseSequenceNumber(url, index);
    this.highestSequence = Math.max(this.highestSequence, sequence);

    const path = join(this.dir, `fragment_${String(index).padStart(5, "0")}.ts`);
    this.writes.push(this.write({ index, url, sequence, size: 0, path }, readBody));
    return true;
  }

  private async write(fragment: Fragment, readBody: BodyReader): Promise<void> {
    try {
      const body = await readBody();
      await writeFile(fragment.path, body);
      this.written.push({ ...fragment, size: body.byteLength });
    } catch (error) {
      this.logger.warn(`Could not save fragment ${fragment.index}: ${errorMessage(error)}`);
    }
  }

  /** Fragments kept so far, including writes still in flight */
  get count(): number {
    return Math.min(this.arrivals, this.keepBelow);
  }

  get totalBytes(): number {
    return this.fragments().reduce((total, fragment) => total + fragment.size, 0);
  }

  /**
   * Media position covered by the highest fragment seen, in seconds.
   */
  get capturedUntilSeconds(): number {
    return this.highestSequence < 0 ? 0 : this.highestSequence * this.segmentSeconds;
  }

  /**
   * Stops accepting responses; later arrivals belong to another video.
   * With keepBelow, fragments from that capture index on are dropped as well.
   */
  seal(keepBelow?: number): void {
    this.sealed = true;
    if (keepBelow !== undefined) {
      this.keepBelow = Math.min(this.keepBelow, keepBelow);
    }
  }

  /** Waits for every pending write */
  async settle(): Promise<void> {
    await Promise.all(this.writes);
  }

  /** Successfully written fragments in capture order */
  fragments(): Fragment[] {
    return this.written
      .filter((fragment) => fragment.index < this.keepBelow)
      .sort((a, b) => a.index - b.index);
  }

  /**
   * Concat demuxer list with paths relative to the store directory.
   */
  buildConcatList(): string {
    return this.fragments()
      .map((fragment) => `file '${basename(fragment.path)}'`)
      .join("\n");
  }
}
