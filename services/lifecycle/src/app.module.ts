import { Module } from "@nestjs/common";
import { APP_FILTER } from "@nestjs/core";

import { GraphRemoteLibraryClient } from "./clients/graph.client.js";
import { loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { DashboardController } from "./controllers/dashboard.controller.js";
import { DownloadController } from "./controllers/download.controller.js";
import { HealthController } from "./controllers/health.controller.js";
import { RestoreController } from "./controllers/restore.controller.js";
import { LifecycleExceptionFilter } from "./filters/lifecycle-exception.filter.js";
import { InMemoryAuditRepository } from "./repository/memory.repository.js";
import { PostgresAuditRepository } from "./repository/postgres.repository.js";
import { ArchiverService } from "./services/archiver.service.js";
import { AuditService } from "./services/audit.service.js";
import { RestoreService } from "./services/restore.service.js";
import { RetrievalService } from "./services/retrieval.service.js";
import { ScannerService } from "./services/scanner.service.js";
import { InMemoryColdStorage } from "./storage/memory.storage.js";
import { S3StorageService } from "./storage/s3.storage.js";
import { APP_CONFIG, AUDIT_REPOSITORY, COLD_STORAGE, REMOTE_LIBRARY } from "./tokens.js";

const configProvider = {
  provide: APP_CONFIG,
  useFactory: () => loadConfig(),
};

const coldStorageProvider = {
  provide: COLD_STORAGE,
  inject: [APP_CONFIG],
  useFactory: (config: AppConfig) => {
    if (config.coldStorage.bucket) {
      return new S3StorageService(config.coldStorage);
    }
    return new InMemoryColdStorage(config.coldStorage.storageClass, config.coldStorage.prefix);
  },
};

const repositoryProvider = {
  provide: AUDIT_REPOSITORY,
  inject: [APP_CONFIG],
  useFactory: async (config: AppConfig) => {
    if (config.database.url) {
      const repo = new PostgresAuditRepository(config.database.url);
      await repo.init();
      return repo;
    }
    return new InMemoryAuditRepository();
  },
};

const remoteLibraryProvider = {
  provide: REMOTE_LIBRARY,
  useExisting: GraphRemoteLibraryClient,
};

@Module({
  imports: [],
  controllers: [DashboardController, DownloadController, RestoreController, HealthController],
  providers: [
    configProvider,
    coldStorageProvider,
    repositoryProvider,
    remoteLibraryProvider,
    GraphRemoteLibraryClient,
    ArchiverService,
    ScannerService,
    RestoreService,
    RetrievalService,
    AuditService,
    { provide: APP_FILTER, useClass: LifecycleExceptionFilter },
  ],
})
export class AppModule {}
