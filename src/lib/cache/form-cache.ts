// src/lib/cache/form-cache.ts
// Purpose: Read-through cache for form lookups. A cached `null` records
// "no form bound", which the answer_questions guard reads often.
// Every key carries a generation that `invalidate` bumps; a fill stamped with
// an older generation is dropped, so a slow reader cannot put back a tree
// that a form rebuild already replaced.

import type Redis from "ioredis";

import type { Form } from "@/modules/forms/form.types";
import { StoredFormSchema } from "@/modules/forms/form.schemas";
import { log, errorMeta } from "@/lib/observability/logger";

export const formCacheKeys = {
  primary: "form:primary",
  byClassification: (classificationId: string) =>
    `form:classification:${classificationId}`,
};

export interface FormCache {
  /** `undefined` on a miss. */
  get(key: string): Promise<Form | null | undefined>;
  /** Read before loading the value to fill with. `null`: do not fill. */
  generation(key: string): Promise<number | null>;
  /** Stores only while `key` is still at `generation`. */
  set(key: string, form: Form | null, generation: number): Promise<boolean>;
  invalidate(keys: string[]): Promise<void>;
}

////////////////////////////////////////////////////////////////
// In-process
////////////////////////////////////////////////////////////////

export class MemoryFormCache implements FormCache {
  private readonly entries = new Map<string, Form | null>();
  private readonly generations = new Map<string, number>();

  async get(key: string) {
    if (!this.entries.has(key)) return undefined;
    return structuredClone(this.entries.get(key));
  }

  async generation(key: string) {
    return this.generations.get(key) ?? 0;
  }

  async set(key: string, form: Form | null, generation: number) {
    if ((this.generations.get(key) ?? 0) !== generation) return false;
    this.entries.set(key, structuredClone(form));
    return true;
  }

  async invalidate(keys: string[]) {
    for (const key of keys) {
      this.entries.delete(key);
      this.generations.set(key, (this.generations.get(key) ?? 0) + 1);
    }
  }
}

////////////////////////////////////////////////////////////////
// Redis
////////////////////////////////////////////////////////////////

const CachedFormSchema = StoredFormSchema.nullable();

const DEFAULT_TTL_SECONDS = 300;

const generationKey = (key: string) => `${key}:gen`;

// KEYS[1] value key, KEYS[2] generation key; ARGV: generation, payload, ttl
const SET_IF_GENERATION = `
if tonumber(redis.call("GET", KEYS[2]) or "0") ~= tonumber(ARGV[1]) then
  return 0
end
redis.call("SET", KEYS[1], ARGV[2], "EX", ARGV[3])
return 1
`;

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/**
 * Cache failures degrade to a miss; the database stays the source of truth.
 */
export class RedisFormCache implements FormCache {
  constructor(
    private readonly redis: Redis,
    private readonly ttlSeconds: number = DEFAULT_TTL_SECONDS,
  ) {}

  async get(key: string) {
    let raw: string | null;
    try {
      raw = await this.redis.get(key);
    } catch (err) {
      log("WARN", "FORM_CACHE_READ_FAILED", { key, ...errorMeta(err) });
      return undefined;
    }

    if (raw === null) return undefined;

    const parsed = CachedFormSchema.safeParse(parseJson(raw));
    if (!parsed.success) {
      log("WARN", "FORM_CACHE_ENTRY_INVALID", { key });
      return undefined;
    }
    return parsed.data;
  }

  async generation(key: string) {
    try {
      const raw = await this.redis.get(generationKey(key));
      return raw === null ? 0 : Number(raw);
    } catch (err) {
      log("WARN", "FORM_CACHE_READ_FAILED", { key, ...errorMeta(err) });
      return null;
    }
  }

  async set(key: string, form: Form | null, generation: number) {
    try {
      const stored = await this.redis.eval(
        SET_IF_GENERATION,
        2,
        key,
        generationKey(key),
        generation,
        JSON.stringify(form),
        this.ttlSeconds,
      );
      return stored === 1;
    } catch (err) {
      log("WARN", "FORM_CACHE_WRITE_FAILED", { key, ...errorMeta(err) });
      return false;
    }
  }

  async invalidate(keys: string[]) {
    if (keys.length === 0) return;

    const tx = this.redis.multi().del(...keys);
    keys.forEach((key) => tx.incr(generationKey(key)));
    await tx.exec();
  }
}

