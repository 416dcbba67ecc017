import {
  Controller,
  Get,
  Inject,
  ServiceUnavailableException,
} from '@nestjs/common';
import { APP_CONFIG, type AppConfig } from '../config/app-config';
import {
  CONNECTION_CONFIG,
  type ConnectionConfig,
  describeConnection,
} from '../connection/connection.types';
import { ContractRepository } from '../contracts/contract.repository';

@Controller('api')
export class HealthController {
  constructor(
    private readonly contracts: ContractRepository,
    @Inject(CONNECTION_CONFIG) private readonly connection: ConnectionConfig,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  private ensureDev() {
    if (!this.config.devMode) {
      throw new ServiceUnavailableException('DEV_MODE is off.');
    }
  }

  @Get('health')
  async health() {
    await this.contracts.ping();
    const { source, host, port, database } = describeConnection(
      this.connection,
    );
    return {
      status: 'ok',
      database: 'up',
      connection: { source, host, port, database },
    };
  }

  @Get('dev/connection')
  connectionInfo() {
    this.ensureDev();
    return describeConnection(this.connection);
  }
}
