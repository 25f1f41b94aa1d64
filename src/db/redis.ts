import { Redis } from "@upstash/redis";

import { getEnv } from "../config/env.js";

let redisClient: Redis | null = null;

export function getRedis(): Redis {
  if (redisClient) {
    return redisClient;
  }

  const env = getEnv();
  redisClient = new Redis({
    url: env.UPSTASH_REDIS_REST_URL,
    token: env.UPSTASH_REDIS_REST_TOKEN,
    retry: { retries: 3 }
  });
  return redisClient;
}
