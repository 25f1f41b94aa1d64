import type { AppEnv } from "../config/env.js";
import { getEnv } from "../config/env.js";
import { errorMessage, logger } from "../lib/logger.js";
import { OffsetStoreService } from "../services/offset-store-service.js";
import { UpdateDedupeService } from "../services/update-dedupe-service.js";
import type { TelegramUpdate } from "./types.js";

interface UpdateSourceLike {
  getUpdates(offset: number, timeoutSeconds: number): Promise<TelegramUpdate[]>;
}

interface UpdateRouterLike {
  route(update: TelegramUpdate): Promise<void>;
}

interface UpdateDedupeLike {
  shouldProcess(updateId: number): Promise<boolean>;
}

interface OffsetStoreLike {
  getOffset(): Promise<number>;
  setOffset(offset: number): Promise<void>;
}

type PollerEnv = Pick<AppEnv, "POLL_TIMEOUT_SECONDS" | "POLL_RETRY_MS">;

export class TelegramPoller {
  private readonly env: PollerEnv;
  private shouldStop = false;

  constructor(
    private readonly client: UpdateSourceLike,
    private readonly router: UpdateRouterLike,
    env?: PollerEnv,
    private readonly dedupe: UpdateDedupeLike = new UpdateDedupeService(),
    private readonly offsets: OffsetStoreLike = new OffsetStoreService()
  ) {
    this.env = env ?? getEnv();
  }

  stop(): void {
    this.shouldStop = true;
  }

  async run(): Promise<void> {
    let offset = await this.offsets.getOffset();
    logger.info("Starting Telegram long poll worker", { offset });

    while (!this.shouldStop) {
      try {
        const updates = await this.client.getUpdates(offset, this.env.POLL_TIMEOUT_SECONDS);

        for (const update of updates) {
          // Updates left unrouted stay above the stored offset and are fetched again on restart.
          if (this.shouldStop) {
            break;
          }

          if (await this.dedupe.shouldProcess(update.update_id)) {
            await this.router.route(update);
          }

          offset = Math.max(offset, update.update_id + 1);
          await this.offsets.setOffset(offset);
        }
      } catch (error) {
        logger.error("Polling loop failed", { error: errorMessage(error) });
        await sleep(this.env.POLL_RETRY_MS);
      }
    }

    logger.info("Telegram poller stopped");
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
