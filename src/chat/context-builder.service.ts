import { Injectable, Logger } from '@nestjs/common';
import { ContractRepository } from '../contracts/contract.repository';
import {
  FIELD_LABELS,
  OPTIONAL_CONTRACT_FIELDS,
  type ContractRecord,
  type ContractStats,
} from '../contracts/contract.types';

export type ContextMode = 'contract' | 'aggregate';

export type ChatContext = {
  mode: ContextMode;
  /** Set only in `contract` mode. */
  code?: string;
  text: string;
};

/** Upper bound for a single record value placed in the prompt. */
export const MAX_FIELD_CHARS = 500;
const MISSING = 'missing';

function clip(value: string): string {
  const flat = value.replace(/\s+/g, ' ').trim();
  return flat.length > MAX_FIELD_CHARS
    ? `${flat.slice(0, MAX_FIELD_CHARS - 1)}…`
    : flat;
}

export function renderContract(record: ContractRecord): string {
  const lines = [`Selected contract ${clip(record.code)}:`];
  for (const f of OPTIONAL_CONTRACT_FIELDS) {
    const value = record[f];
    const shown = value === null ? MISSING : clip(value);
    lines.push(`- ${FIELD_LABELS[f]}: ${shown}`);
  }
  lines.push(`- Extracted at: ${record.extractedAt ?? MISSING}`);
  return lines.join('\n');
}

export function renderStats(stats: ContractStats): string {
  const lines = [
    'Contracts summary:',
    `- Total contracts: ${stats.total}`,
    `- Last extraction: ${stats.lastExtractedAt ?? 'never'}`,
  ];
  for (const f of OPTIONAL_CONTRACT_FIELDS) {
    const { present, missing } = stats.fields[f];
    lines.push(`- ${FIELD_LABELS[f]}: ${present} present, ${missing} missing`);
  }
  return lines.join('\n');
}

/**
 * Produces the text the assistant sees next to a question: the selected
 * contract when there is one, always followed by table-wide counts. Raw rows
 * are never enumerated, so size does not depend on the table.
 */
@Injectable()
export class ContextBuilder {
  private readonly logger = new Logger(ContextBuilder.name);

  constructor(private readonly contracts: ContractRepository) {}

  async build(question: string, selectedCode?: string): Promise<ChatContext> {
    const code = selectedCode?.trim();
    let record: ContractRecord | null = null;

    if (code) {
      record = await this.contracts.get(code);
      if (!record) {
        this.logger.warn(
          `Selected contract ${code} not found; answering from the summary`,
        );
      }
    }

    const stats = renderStats(await this.contracts.aggregateStats());
    const target = record ? `contract ${record.code}` : 'aggregate';
    this.logger.debug(
      `Context for a ${question.length}-char question: ${target}`,
    );

    if (record) {
      return {
        mode: 'contract',
        code: record.code,
        text: `${renderContract(record)}\n\n${stats}`,
      };
    }
    return {
      mode: 'aggregate',
      text: `No specific contract is selected.\n\n${stats}`,
    };
  }
}
