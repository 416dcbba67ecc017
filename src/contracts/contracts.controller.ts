import {
  Controller,
  Get,
  NotFoundException,
  Param,
  Query,
} from '@nestjs/common';
import { ContractRepository } from './contract.repository';

@Controller('api')
export class ContractsController {
  constructor(private readonly contracts: ContractRepository) {}

  @Get('contracts')
  async list(@Query('extracted') extracted?: string) {
    const contracts = await this.contracts.listAll({
      extractedOnly: extracted === 'true' || extracted === '1',
    });
    return { contracts, total: contracts.length };
  }

  @Get('contracts/:code')
  async get(@Param('code') code: string) {
    const contract = await this.contracts.get(code);
    if (!contract) throw new NotFoundException(`Contract ${code} not found`);
    return { contract };
  }

  @Get('stats')
  async stats() {
    return this.contracts.aggregateStats();
  }
}
