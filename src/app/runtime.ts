import { getEnv } from "../config/env.js";
import { runMigrations } from "../db/migrations.js";
import { closeSql } from "../db/postgres.js";
import { ApprovedParticipantRepository } from "../db/repositories/approved-participant-repository.js";
import { errorMessage, logger, setLogLevel } from "../lib/logger.js";
import { ApprovalRegistry } from "../services/approval-registry.js";
import { ApprovalWorkflowService } from "../services/approval-workflow-service.js";
import { AuditTrailService } from "../services/audit-trail-service.js";
import { ModerationCommandService } from "../services/moderation-command-service.js";
import { ReviewNotifierService } from "../services/review-notifier-service.js";
import { ReviewerPermissionService } from "../services/reviewer-permission-service.js";
import { TelegramClient } from "../telegram/telegram-client.js";
import { TelegramGateway } from "../telegram/telegram-gateway.js";
import { TelegramPoller } from "../telegram/poller.js";
import { UpdateRouter } from "../telegram/update-router.js";

export async function runRuntime(): Promise<void> {
  const env = getEnv();
  setLogLevel(env.LOG_LEVEL);
  logger.info("Configuration loaded", {
    approvalTimeoutSeconds: env.APPROVAL_TIMEOUT_SECONDS,
    reviewerRoleId: env.REVIEWER_ROLE_ID ?? null,
    commandPrefix: env.COMMAND_PREFIX,
    requiredBotCapabilities: env.REQUIRED_BOT_CAPABILITIES
  });

  await runMigrations();

  const telegramClient = new TelegramClient();
  const me = await telegramClient.getMe();
  const self = { id: String(me.id), username: me.username ?? null };

  const gateway = new TelegramGateway(telegramClient);
  const permissions = new ReviewerPermissionService(telegramClient, self.id);
  const audit = new AuditTrailService();
  const workflow = new ApprovalWorkflowService(
    new ApprovalRegistry(),
    audit,
    permissions,
    new ReviewNotifierService(gateway),
    gateway,
    new ApprovedParticipantRepository()
  );
  const commands = new ModerationCommandService(workflow, audit, permissions);
  const router = new UpdateRouter(telegramClient, workflow, commands, self);
  const poller = new TelegramPoller(telegramClient, router);

  let polling: Promise<void> | null = null;

  // The poller must finish routing before the workflow and database go away.
  const shutdown = async (): Promise<void> => {
    logger.info("Shutting down worker");
    poller.stop();
    if (polling) {
      // A failed run already rejects runRuntime; here it only has to be over.
      await polling.catch(() => undefined);
    }
    await workflow.shutdown();
    await closeSql();
  };

  const onSignal = (): void => {
    void shutdown().catch((error) => {
      logger.error("Shutdown failed", { error: errorMessage(error) });
    });
  };

  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  logger.info("Participant gate online", { botId: self.id, username: self.username });
  polling = poller.run();
  await polling;
}
