#!/usr/bin/env node
/**
 * KYC intake MCP server entrypoint.
 * stdio transport for IDE/agent connections; logs go to stderr.
 */
import { loadConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { AnthropicExtractionBackend } from "./extraction/anthropic.js";
import { createLogger } from "./logger.js";
import { KycIntakeService } from "./orchestration/intake.js";
import { createServer, createStdioTransport, SERVER_NAME } from "./server.js";
import { ResendEmailNotifier } from "./sinks/email.js";
import { PdfFormRenderer } from "./sinks/pdf-form.js";

const config = loadConfig();
const logger = createLogger({ level: config.logLevel });

const { rendering, notification } = config;
const recipients = notification.to
  .split(",")
  .map((address) => address.trim())
  .filter(Boolean);

const notifying =
  Boolean(notification.resendApiKey) && Boolean(notification.from) && recipients.length > 0;

const intake = new KycIntakeService({
  backend: new AnthropicExtractionBackend({
    apiKey: config.extraction.apiKey,
    model: config.extraction.model,
  }),
  renderer: rendering.templatesDir
    ? new PdfFormRenderer({
        templatesDir: rendering.templatesDir,
        outputDir: rendering.outputDir,
        dealingRep: rendering.dealingRep,
      })
    : undefined,
  notifier: notifying
    ? new ResendEmailNotifier({
        apiKey: notification.resendApiKey,
        from: notification.from,
        to: recipients,
      })
    : undefined,
  logger,
  timeoutMs: config.extraction.timeoutMs,
  totalsTolerance: config.normaliser.totalsTolerance,
  maxRetainedResults: config.intake.maxRetainedResults,
});

const server = createServer({ intake, totalsTolerance: config.normaliser.totalsTolerance });
const transport = createStdioTransport();

server
  .connect(transport)
  .then(() => {
    logger.info(
      {
        rendering: Boolean(rendering.templatesDir),
        notification: notifying,
      },
      `${SERVER_NAME}: running on stdio`
    );
  })
  .catch((err: unknown) => {
    logger.fatal({ err: errorMessage(err) }, `${SERVER_NAME}: failed to start`);
    process.exit(1);
  });
