import type { IdGenerator } from "@/server/awards/ids";
import type { AwardRecord } from "@/server/awards/types";

/**
 * Stored awards, exchanged as typed records. Implementations own the
 * serialization of the award body.
 */
export interface AwardRepository {
  findByContract(cpid: string): Promise<AwardRecord[]>;
  findByStage(cpid: string, stage: string): Promise<AwardRecord[]>;
  findOne(cpid: string, stage: string, token: string): Promise<AwardRecord | null>;
  findById(cpid: string, stage: string, awardId: string): Promise<AwardRecord | null>;
  insert(record: AwardRecord): Promise<void>;
  /** Stores every record or none of them. */
  insertMany(records: AwardRecord[]): Promise<void>;
  update(record: AwardRecord): Promise<void>;
}

export interface AwardPeriodRepository {
  findStart(cpid: string, stage: string): Promise<string | null>;
  /**
   * Writes `start` unless a start date already exists for the pair and
   * returns whichever value is stored afterwards.
   */
  saveStart(cpid: string, stage: string, start: string): Promise<string>;
}

export type AwardServiceDeps = {
  awards: AwardRepository;
  awardPeriods: AwardPeriodRepository;
  ids: IdGenerator;
};
