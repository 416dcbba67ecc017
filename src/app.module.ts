import { type DynamicModule, Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { BedrockService } from './bedrock/bedrock.service';
import { ChatController } from './chat/chat.controller';
import { ChatOrchestrator } from './chat/chat-orchestrator.service';
import { ChatService } from './chat/chat.service';
import { ContextBuilder } from './chat/context-builder.service';
import { LLM_CLIENT } from './chat/llm-client';
import { AppExceptionFilter } from './common/app-exception.filter';
import { APP_CONFIG, type AppConfig } from './config/app-config';
import { ConnectionResolver } from './connection/connection-resolver.service';
import { createConnectionStore } from './connection/connection-store.factory';
import {
  CONNECTION_CONFIG,
  CONNECTION_STORE,
  type ConnectionConfig,
} from './connection/connection.types';
import { ContractRepository } from './contracts/contract.repository';
import { ContractsController } from './contracts/contracts.controller';
import { PG_POOL, createPool } from './database/database';
import { HealthController } from './health/health.controller';

@Module({})
export class AppModule {
  /** The configuration is built once by the caller and never re-read. */
  static register(config: AppConfig): DynamicModule {
    return {
      module: AppModule,
      controllers: [ContractsController, ChatController, HealthController],
      providers: [
        { provide: APP_CONFIG, useValue: config },
        { provide: APP_FILTER, useClass: AppExceptionFilter },
        {
          provide: CONNECTION_STORE,
          useFactory: (cfg: AppConfig) => createConnectionStore(cfg),
          inject: [APP_CONFIG],
        },
        ConnectionResolver,
        {
          provide: CONNECTION_CONFIG,
          useFactory: (resolver: ConnectionResolver) => resolver.resolve(),
          inject: [ConnectionResolver],
        },
        {
          provide: PG_POOL,
          useFactory: (conn: ConnectionConfig, cfg: AppConfig) =>
            createPool(conn, cfg),
          inject: [CONNECTION_CONFIG, APP_CONFIG],
        },
        ContractRepository,
        BedrockService,
        { provide: LLM_CLIENT, useExisting: BedrockService },
        ContextBuilder,
        ChatOrchestrator,
        ChatService,
      ],
    };
  }
}
