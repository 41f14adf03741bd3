import { CreatorRegistryFileSchema } from '../shared/schemas.js';
import { DuplicateCreatorError, NotFoundError } from '../shared/errors.js';
import { readJsonFile, writeJsonAtomic } from '../workspace/json-file.js';
import type { Creator } from '../workspace/types.js';

export interface AddCreatorInput {
  name: string;
  channel_url: string;
  destination_handle: string;
  payment_link?: string | null;
  check_interval_minutes?: number;
  clips_per_video?: number;
}

export type CreatorPatch = Partial<
  Pick<
    Creator,
    | 'channel_url'
    | 'destination_handle'
    | 'payment_link'
    | 'check_interval_minutes'
    | 'clips_per_video'
    | 'active'
  >
>;

export interface CreatorDefaults {
  checkIntervalMinutes: number;
  clipsPerVideo: number;
}

/**
 * Creator registry backed by a single JSON array. The in-memory copy is only
 * replaced after the file write succeeds, so a failed write leaves both the
 * file and this object at the previous state.
 */
export class CreatorRegistry {
  private creators: Creator[];

  constructor(
    private readonly filePath: string,
    private readonly defaults: CreatorDefaults,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.creators = readJsonFile(filePath, CreatorRegistryFileSchema, []);
  }

  get size(): number {
    return this.creators.length;
  }

  add(input: AddCreatorInput): Creator {
    const name = input.name.trim();
    if (this.find(name)) {
      throw new DuplicateCreatorError(name);
    }
    const creator: Creator = {
      name,
      channel_url: input.channel_url,
      destination_handle: input.destination_handle,
      payment_link: input.payment_link ?? null,
      check_interval_minutes: input.check_interval_minutes ?? this.defaults.checkIntervalMinutes,
      last_checked: null,
      clips_per_video: input.clips_per_video ?? this.defaults.clipsPerVideo,
      active: true,
      added_at: this.now().toISOString(),
    };
    this.persist([...this.creators, creator]);
    return { ...creator };
  }

  remove(name: string): Creator {
    const existing = this.get(name);
    this.persist(this.creators.filter((c) => c.name !== name));
    return existing;
  }

  find(name: string): Creator | null {
    const found = this.creators.find((c) => c.name === name);
    return found ? { ...found } : null;
  }

  get(name: string): Creator {
    const found = this.find(name);
    if (!found) throw new NotFoundError('creator', name);
    return found;
  }

  /**
   * All creators in insertion order. Each iteration starts over from the
   * registry's state at that moment.
   */
  list(): Iterable<Creator> {
    const current = () => this.creators;
    return {
      *[Symbol.iterator]() {
        for (const creator of current()) {
          yield { ...creator };
        }
      },
    };
  }

  touch(name: string, timestamp: Date): Creator {
    return this.update(name, {}, timestamp.toISOString());
  }

  update(name: string, patch: CreatorPatch, lastChecked?: string): Creator {
    const index = this.creators.findIndex((c) => c.name === name);
    const current = this.creators[index];
    if (!current) throw new NotFoundError('creator', name);
    const updated: Creator = {
      ...current,
      ...definedOnly(patch),
      last_checked: lastChecked ?? current.last_checked,
    };
    const next = [...this.creators];
    next[index] = updated;
    this.persist(next);
    return { ...updated };
  }

  private persist(next: Creator[]): void {
    writeJsonAtomic(this.filePath, next);
    this.creators = next;
  }
}

function definedOnly(patch: CreatorPatch): CreatorPatch {
  const out: CreatorPatch = {};
  if (patch.channel_url !== undefined) out.channel_url = patch.channel_url;
  if (patch.destination_handle !== undefined) out.destination_handle = patch.destination_handle;
  if (patch.payment_link !== undefined) out.payment_link = patch.payment_link;
  if (patch.check_interval_minutes !== undefined) out.check_interval_minutes = patch.check_interval_minutes;
  if (patch.clips_per_video !== undefined) out.clips_per_video = patch.clips_per_video;
  if (patch.active !== undefined) out.active = patch.active;
  return out;
}
