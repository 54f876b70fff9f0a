import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { config } from '../shared/config.js';
import { DataUnavailableError, errorMessage } from '../shared/errors.js';
import { evaluationRowSchema, messageRowSchema } from '../shared/rowSchemas.js';
import { getSupabase } from '../shared/supabase.js';
import type {
  DateRange,
  Evaluation,
  Message,
  Pagination,
  RecordId,
} from '../types/recordTypes.js';

// PostgREST caps a single response at 1000 rows by default
export const STORE_PAGE_SIZE = 1000;

// Keeps `in.(...)` filters short enough for a request URL
export const ID_CHUNK_SIZE = 200;

interface StoreResponse {
  data: unknown;
  error: { message: string } | null;
}

export interface GatewayTables {
  messages: string;
  evaluations: string;
}

export interface DataGateway {
  fetchMessages(range: DateRange, pagination?: Pagination): Promise<Message[]>;
  fetchEvaluations(messageIds: RecordId[]): Promise<Evaluation[]>;
  fetchAllEvaluations(): Promise<Evaluation[]>;
  fetchMessagesByIds(ids: RecordId[], range: DateRange, limit: number): Promise<Message[]>;
}

export function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export function newestFirst(a: Message, b: Message): number {
  return Date.parse(b.created_at) - Date.parse(a.created_at);
}

export class SupabaseDataGateway implements DataGateway {
  constructor(
    private readonly client: SupabaseClient = getSupabase(),
    private readonly tables: GatewayTables = {
      messages: config.supabase.messagesTable,
      evaluations: config.supabase.evaluationsTable,
    }
  ) {}

  // Messages inside [start, end), newest first. Without pagination every
  // matching row is read, one store page at a time.
  async fetchMessages(range: DateRange, pagination?: Pagination): Promise<Message[]> {
    if (pagination) {
      const { limit, offset } = pagination;
      if (limit <= 0) return [];

      return this.readRows(
        'messages',
        messageRowSchema,
        this.messagesQuery(range).range(offset, offset + limit - 1)
      );
    }

    return this.readAllPages('messages', messageRowSchema, (from, to) =>
      this.messagesQuery(range).range(from, to)
    );
  }

  async fetchEvaluations(messageIds: RecordId[]): Promise<Evaluation[]> {
    const ids = unique(messageIds);
    if (ids.length === 0) return [];

    const batches = await Promise.all(
      chunk(ids, ID_CHUNK_SIZE).map((idChunk) =>
        this.readRows(
          'evaluations',
          evaluationRowSchema,
          this.client.from(this.tables.evaluations).select('*').in('message_id', idChunk)
        )
      )
    );

    return batches.flat();
  }

  async fetchAllEvaluations(): Promise<Evaluation[]> {
    return this.readAllPages('evaluations', evaluationRowSchema, (from, to) =>
      this.client
        .from(this.tables.evaluations)
        .select('*')
        .order('message_id', { ascending: true })
        .order('id', { ascending: true })
        .range(from, to)
    );
  }

  async fetchMessagesByIds(ids: RecordId[], range: DateRange, limit: number): Promise<Message[]> {
    const uniqueIds = unique(ids);
    if (uniqueIds.length === 0 || limit <= 0) return [];

    const batches = await Promise.all(
      chunk(uniqueIds, ID_CHUNK_SIZE).map((idChunk) =>
        this.readRows(
          'messages',
          messageRowSchema,
          this.messagesQuery(range).in('id', idChunk).limit(limit)
        )
      )
    );

    return batches.flat().sort(newestFirst).slice(0, limit);
  }

  private messagesQuery(range: DateRange) {
    let query = this.client.from(this.tables.messages).select('*');

    if (range.start) {
      query = query.gte('created_at', range.start.toISOString());
    }

    // Rows written in one transaction share created_at; id keeps offset
    // paging stable across requests
    return query
      .lt('created_at', range.end.toISOString())
      .order('created_at', { ascending: false })
      .order('id', { ascending: false });
  }

  private async readAllPages<T>(
    label: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    page: (from: number, to: number) => PromiseLike<StoreResponse>
  ): Promise<T[]> {
    const rows: T[] = [];

    for (let offset = 0; ; offset += STORE_PAGE_SIZE) {
      const batch = await this.readRows(label, schema, page(offset, offset + STORE_PAGE_SIZE - 1));
      rows.push(...batch);

      if (batch.length < STORE_PAGE_SIZE) {
        return rows;
      }
    }
  }

  private async readRows<T>(
    label: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    request: PromiseLike<StoreResponse>
  ): Promise<T[]> {
    let response: StoreResponse;

    try {
      response = await request;
    } catch (error: unknown) {
      throw new DataUnavailableError(`Failed to read ${label}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (response.error) {
      throw new DataUnavailableError(`Failed to read ${label}: ${response.error.message}`, {
        cause: response.error,
      });
    }

    const parsed = z.array(schema).safeParse(response.data ?? []);

    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const detail = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unexpected shape';
      throw new DataUnavailableError(`Malformed ${label} rows (${detail})`, {
        cause: parsed.error,
      });
    }

    return parsed.data;
  }
}

function unique(ids: RecordId[]): RecordId[] {
  return Array.from(new Set(ids));
}
