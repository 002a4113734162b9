import type { SupabaseClient } from "@supabase/supabase-js";
import { awardTables, type AwardTables } from "@/lib/supabaseServer";
import { decodeAward, encodeAward } from "@/server/awards/codec";
import { AwardIntegrityError } from "@/server/awards/failures";
import { logAwardError, serializeSupabaseError } from "@/server/awards/logging";
import type {
  AwardPeriodRepository,
  AwardRepository,
} from "@/server/awards/repository";
import type { AwardRecord } from "@/server/awards/types";

type AwardRow = {
  cpid: string;
  stage: string;
  award_id: string;
  token: string;
  owner: string;
  status: string;
  status_details: string;
  json_data: unknown;
};

type AwardPeriodRow = {
  cpid: string;
  stage: string;
  start_date: string;
};

const AWARD_COLUMNS = "cpid,stage,award_id,token,owner,status,status_details,json_data";

type StoreOptions = {
  tables?: Partial<AwardTables>;
};

function failStore(message: string, error: unknown, context: Record<string, unknown>): never {
  const serialized = serializeSupabaseError(error);
  logAwardError("store", message, { ...context, pg: serialized });
  throw new Error(
    serialized.message ? `${message}: ${serialized.message}` : message,
  );
}

export function toAwardRow(record: AwardRecord): AwardRow {
  return {
    cpid: record.cpid,
    stage: record.stage,
    award_id: record.award.id,
    token: record.token,
    owner: record.owner,
    status: record.award.status,
    status_details: record.award.statusDetails,
    json_data: encodeAward(record.award),
  };
}

export function fromAwardRow(row: AwardRow): AwardRecord {
  const decoded = decodeAward(row.json_data);
  if (!decoded.ok) {
    logAwardError("store", "award body could not be decoded", {
      cpid: row.cpid,
      stage: row.stage,
      awardId: row.award_id,
      error: decoded.error,
    });
    throw new AwardIntegrityError(
      `Stored award '${row.award_id}' could not be decoded: ${decoded.error}`,
    );
  }
  return {
    cpid: row.cpid,
    stage: row.stage,
    owner: row.owner,
    token: row.token,
    award: decoded.award,
  };
}

export function createSupabaseAwardRepository(
  client: SupabaseClient,
  options: StoreOptions = {},
): AwardRepository {
  const table = options.tables?.awards ?? awardTables().awards;

  async function findMany(filters: Record<string, string>): Promise<AwardRecord[]> {
    let query = client.from(table).select(AWARD_COLUMNS);
    for (const [column, value] of Object.entries(filters)) {
      query = query.eq(column, value);
    }
    const { data, error } = await query.returns<AwardRow[]>();
    if (error) {
      failStore("award lookup failed", error, filters);
    }
    return (data ?? []).map(fromAwardRow);
  }

  async function findSingle(filters: Record<string, string>): Promise<AwardRecord | null> {
    let query = client.from(table).select(AWARD_COLUMNS);
    for (const [column, value] of Object.entries(filters)) {
      query = query.eq(column, value);
    }
    const { data, error } = await query.maybeSingle<AwardRow>();
    if (error) {
      failStore("award lookup failed", error, filters);
    }
    return data ? fromAwardRow(data) : null;
  }

  return {
    findByContract: (cpid) => findMany({ cpid }),
    findByStage: (cpid, stage) => findMany({ cpid, stage }),
    findOne: (cpid, stage, token) => findSingle({ cpid, stage, token }),
    findById: (cpid, stage, awardId) => findSingle({ cpid, stage, award_id: awardId }),

    async insert(record) {
      const { error } = await client.from(table).insert(toAwardRow(record));
      if (error) {
        failStore("award insert failed", error, {
          cpid: record.cpid,
          stage: record.stage,
          awardId: record.award.id,
        });
      }
    },

    // One statement, so PostgREST commits the whole batch or nothing.
    async insertMany(records) {
      if (records.length === 0) {
        return;
      }
      const { error } = await client.from(table).insert(records.map(toAwardRow));
      if (error) {
        failStore("award insert failed", error, {
          cpid: records[0].cpid,
          stage: records[0].stage,
          awardIds: records.map((record) => record.award.id),
        });
      }
    },

    async update(record) {
      const row = toAwardRow(record);
      const context = {
        cpid: record.cpid,
        stage: record.stage,
        awardId: record.award.id,
      };
      const { data, error } = await client
        .from(table)
        .update({
          status: row.status,
          status_details: row.status_details,
          json_data: row.json_data,
        })
        .eq("cpid", record.cpid)
        .eq("stage", record.stage)
        .eq("token", record.token)
        .select("award_id")
        .returns<Array<Pick<AwardRow, "award_id">>>();
      if (error) {
        failStore("award update failed", error, context);
      }
      if (!data || data.length === 0) {
        failStore("award update matched no rows", null, context);
      }
    },
  };
}

export function createSupabaseAwardPeriodRepository(
  client: SupabaseClient,
  options: StoreOptions = {},
): AwardPeriodRepository {
  const table = options.tables?.awardPeriods ?? awardTables().awardPeriods;

  async function findStart(cpid: string, stage: string): Promise<string | null> {
    const { data, error } = await client
      .from(table)
      .select("cpid,stage,start_date")
      .eq("cpid", cpid)
      .eq("stage", stage)
      .maybeSingle<AwardPeriodRow>();
    if (error) {
      failStore("award period lookup failed", error, { cpid, stage });
    }
    return data?.start_date ?? null;
  }

  return {
    findStart,

    async saveStart(cpid, stage, start) {
      const { error } = await client
        .from(table)
        .upsert(
          { cpid, stage, start_date: start },
          { onConflict: "cpid,stage", ignoreDuplicates: true },
        );
      if (error) {
        failStore("award period write failed", error, { cpid, stage });
      }

      const stored = await findStart(cpid, stage);
      if (!stored) {
        failStore("award period missing after write", null, { cpid, stage });
      }
      return stored;
    },
  };
}
