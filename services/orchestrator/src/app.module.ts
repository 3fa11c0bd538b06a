import { Module } from "@nestjs/common";

import { sdkSessionOpener } from "./clients/bedrock.session.js";
import { createVisionClients } from "./clients/vision-client.factory.js";
import { HealthController } from "./controllers/health.controller.js";
import { InspectController } from "./controllers/inspect.controller.js";
import { ReportController } from "./controllers/report.controller.js";
import { loadConfig, type AppConfig } from "./config.js";
import { ImageLoader } from "./image/image-loader.js";
import { InspectionOrchestrator } from "./orchestrator/inspection.orchestrator.js";
import { loadPromptTable } from "./prompts.js";
import { InMemoryDecisionRepository } from "./repository/memory.repository.js";
import { PostgresDecisionRepository } from "./repository/postgres.repository.js";
import { InspectionService } from "./services/inspection.service.js";
import { APP_CONFIG, DECISION_REPOSITORY, IMAGE_LOADER, PROMPT_TABLE, VISION_CLIENTS } from "./tokens.js";

const configProvider = {
  provide: APP_CONFIG,
  useFactory: () => loadConfig(),
};

const promptTableProvider = {
  provide: PROMPT_TABLE,
  inject: [APP_CONFIG],
  useFactory: (config: AppConfig) => loadPromptTable(config.promptsPath),
};

const visionClientsProvider = {
  provide: VISION_CLIENTS,
  inject: [APP_CONFIG],
  useFactory: (config: AppConfig) =>
    createVisionClients(config.pipeline.backends, sdkSessionOpener(config.aws), config.pipeline.modelTimeoutMs),
};

const imageLoaderProvider = {
  provide: IMAGE_LOADER,
  inject: [APP_CONFIG],
  useFactory: (config: AppConfig) => new ImageLoader(config),
};

const repositoryProvider = {
  provide: DECISION_REPOSITORY,
  inject: [APP_CONFIG],
  useFactory: async (config: AppConfig) => {
    if (config.database.url) {
      const repo = new PostgresDecisionRepository(config.database.url);
      await repo.init();
      return repo;
    }
    return new InMemoryDecisionRepository();
  },
};

@Module({
  imports: [],
  controllers: [InspectController, ReportController, HealthController],
  providers: [
    configProvider,
    promptTableProvider,
    visionClientsProvider,
    imageLoaderProvider,
    repositoryProvider,
    InspectionOrchestrator,
    InspectionService,
  ],
})
export class AppModule {}
