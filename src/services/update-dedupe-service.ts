import type { Redis } from "@upstash/redis";

import { getRedis } from "../db/redis.js";

const DEDUPE_TTL_SECONDS = 60 * 60 * 24;

export class UpdateDedupeService {
  constructor(private readonly redis: Redis = getRedis()) {}

  /** True the first time an update id is seen within the dedupe window. */
  async shouldProcess(updateId: number): Promise<boolean> {
    const key = `gate:telegram:update:${updateId}`;
    const result = await this.redis.set(key, "1", { ex: DEDUPE_TTL_SECONDS, nx: true });
    return result === "OK";
  }
}
