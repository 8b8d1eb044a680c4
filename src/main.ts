import "reflect-metadata";
import * as dotenv from "dotenv";
dotenv.config();

import helmet from "helmet";
import { NestFactory } from "@nestjs/core";
import { ValidationPipe, type INestApplication } from "@nestjs/common";
import { DocumentBuilder, SwaggerDocumentOptions, SwaggerModule } from "@nestjs/swagger";
import { FilteredLogger } from "./common/logging/filtered-logger";
import { AppModule } from "./app.module";
import { HttpExceptionFilter } from "./common/filters/http-exception.filter";
import { enabledLogLevels } from "./common/types/logging";
import { toError } from "./common/types/error-handling";
import { ConfigService } from "./config/config.service";
import { ENV, ENV_HELPERS } from "./config/environment.constants";

// Global application instance for graceful shutdown
let app: INestApplication | null = null;
const logger = new FilteredLogger("Bootstrap", ENV.LOGGING.LOG_LEVEL);

async function bootstrap(): Promise<void> {
  try {
    app = await NestFactory.create(AppModule, {
      logger: enabledLogLevels(ENV.LOGGING.LOG_LEVEL),
      abortOnError: false,
    });

    validateConfiguration(app.get(ConfigService));

    app.use(
      helmet({
        contentSecurityPolicy: {
          directives: {
            defaultSrc: ["'self'"],
            styleSrc: ["'self'", "'unsafe-inline'"],
            scriptSrc: ["'self'"],
            imgSrc: ["'self'", "data:", "https:"],
          },
        },
        crossOriginEmbedderPolicy: false,
      })
    );

    app.useGlobalPipes(
      new ValidationPipe({
        whitelist: true,
        forbidNonWhitelisted: true,
        transform: true,
        disableErrorMessages: ENV_HELPERS.isProduction(),
      })
    );
    app.useGlobalFilters(new HttpExceptionFilter());

    const basePath = ENV.APPLICATION.BASE_PATH;
    setupSwaggerDocumentation(app, basePath);
    app.setGlobalPrefix(basePath);

    setupGracefulShutdown();

    const PORT = ENV.APPLICATION.PORT;
    await app.listen(PORT, "0.0.0.0");
    logger.log(`HTTP server listening on port ${PORT}${basePath ? ` under ${basePath}` : ""}`);
  } catch (error) {
    const errObj = toError(error);
    logger.error("Application startup failed:", errObj.stack, errObj.message);

    if (app) {
      try {
        await app.close();
      } catch (closeError) {
        logger.error("Application cleanup failed:", toError(closeError).message);
      }
    }

    process.exit(1);
  }
}

function validateConfiguration(configService: ConfigService): void {
  const { isValid, errors, warnings } = configService.validateConfiguration();
  warnings.forEach(warning => logger.warn(warning));

  if (!isValid) {
    throw new Error(`Invalid configuration: ${errors.join("; ")}`);
  }
  logger.log("Environment validation passed");
}

function setupSwaggerDocumentation(app: INestApplication, basePath: string): void {
  const config = new DocumentBuilder()
    .setTitle("Crypto Price Aggregator API")
    .setDescription(
      "Consensus spot price, 24h change and 24h volume for crypto tickers, aggregated from public exchange APIs."
    )
    .setVersion("1.0.0")
    .addTag("Prices", "Aggregated prices as JSON envelopes or plain text")
    .addTag("Administration", "Unsupported-pair registry, price cache and request gateway state")
    .addTag("System Health", "Liveness probe")
    .build();

  const options: SwaggerDocumentOptions = {
    operationIdFactory: (_controllerKey: string, methodKey: string) => methodKey,
  };

  const document = SwaggerModule.createDocument(app, config, options);
  SwaggerModule.setup(`${basePath}/api-doc`, app, document);
  logger.log("API documentation configured");
}

function setupGracefulShutdown(): void {
  let isShuttingDown = false;

  const shutdown = (reason: string, exitCode: number): void => {
    if (isShuttingDown) {
      logger.log(`${reason} during shutdown, ignoring...`);
      return;
    }
    isShuttingDown = true;
    logger.log(`${reason}, starting graceful shutdown...`);

    gracefulShutdown().then(
      () => process.exit(exitCode),
      (error: unknown) => {
        logger.error("Error during shutdown:", toError(error).message);
        process.exit(1);
      }
    );
  };

  for (const signal of ["SIGTERM", "SIGINT", "SIGUSR2"] as const) {
    process.on(signal, () => shutdown(`Received ${signal}`, 0));
  }

  process.on("uncaughtException", error => {
    logger.error("Uncaught Exception:", error.stack, error.message);
    shutdown("Uncaught exception", 1);
  });

  process.on("unhandledRejection", reason => {
    logger.error(`Unhandled Rejection: ${toError(reason).message}`);
    shutdown("Unhandled rejection", 1);
  });
}

/**
 * Closing the app runs every OnModuleDestroy hook, which flushes the cache and the registry.
 */
async function gracefulShutdown(): Promise<void> {
  if (!app) {
    logger.log("No application instance to shutdown");
    return;
  }

  const timeoutMs = ENV.TIMEOUTS.GRACEFUL_SHUTDOWN_MS;
  const shutdownTimeout = setTimeout(() => {
    logger.error(`Shutdown timeout reached after ${timeoutMs}ms, forcing exit`);
    process.exit(1);
  }, timeoutMs);

  const shutdownStartTime = Date.now();
  try {
    await app.close();
    app = null;
    logger.log(`Graceful shutdown completed in ${Date.now() - shutdownStartTime}ms`);
  } finally {
    clearTimeout(shutdownTimeout);
  }
}

// Start the application
void bootstrap();
