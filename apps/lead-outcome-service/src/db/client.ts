import { randomUUID } from "crypto";
import { NotFoundError, StageConflictError } from "../errors";
import {
  ActivityLogEntry,
  ClassificationRecord,
  Lead,
  Notification,
  ScoringConfig,
  StageHistoryRecord,
} from "../types/outcomes";
import { OutcomeStores } from "./types";

/**
 * In-memory database
 * Used when Supabase is not configured (development) and by the tests.
 *
 * Every store method does its reads and writes without awaiting in between,
 * so a single call is atomic with respect to other calls on the event loop.
 */
export class InMemoryDatabase {
  readonly leads = new Map<string, Lead>();
  readonly stageHistory: StageHistoryRecord[] = [];
  readonly classifications: ClassificationRecord[] = [];
  readonly scoringConfigs: ScoringConfig[] = [];
  readonly activities: ActivityLogEntry[] = [];
  readonly notifications: Notification[] = [];

  /**
   * Insert or replace a lead (the CRM side owns lead creation)
   */
  putLead(lead: Partial<Lead> & { id: string }): Lead {
    const record: Lead = {
      first_name: null,
      last_name: null,
      email: null,
      company_name: null,
      industry: null,
      score_value: null,
      current_outcome_stage: null,
      outcome_stage_entered_at: null,
      ...lead,
    };
    this.leads.set(record.id, record);
    return { ...record };
  }

  openRecordsFor(leadId: string): StageHistoryRecord[] {
    return this.stageHistory.filter((r) => r.lead_id === leadId && r.exited_at === null);
  }
}

function copyClassification(record: ClassificationRecord): ClassificationRecord {
  return { ...record, extracted_dates: [...record.extracted_dates] };
}

export function createInMemoryStores(database: InMemoryDatabase = new InMemoryDatabase()): OutcomeStores {
  return {
    leads: {
      async getById(leadId) {
        const lead = database.leads.get(leadId);
        return lead ? { ...lead } : null;
      },

      async findByEmail(email) {
        const wanted = email.toLowerCase();
        for (const lead of database.leads.values()) {
          if (lead.email?.toLowerCase() === wanted) return { ...lead };
        }
        return null;
      },

      async findStaleInStage(stage, enteredBefore) {
        const cutoff = Date.parse(enteredBefore);
        return [...database.leads.values()]
          .filter(
            (lead) =>
              lead.current_outcome_stage === stage &&
              lead.outcome_stage_entered_at !== null &&
              Date.parse(lead.outcome_stage_entered_at) <= cutoff
          )
          .map((lead) => ({ ...lead }));
      },
    },

    stageHistory: {
      async applyTransition(write) {
        const lead = database.leads.get(write.leadId);
        if (!lead) throw new NotFoundError("Lead", write.leadId);

        // Compare-and-set on the lead's current stage
        if (lead.current_outcome_stage !== write.expectedStage) {
          throw new StageConflictError(write.leadId, write.expectedStage, lead.current_outcome_stage);
        }

        for (const open of database.openRecordsFor(write.leadId)) {
          open.exited_at = write.at;
        }

        const record: StageHistoryRecord = {
          id: randomUUID(),
          lead_id: write.leadId,
          stage: write.newStage,
          previous_stage: lead.current_outcome_stage,
          reason: write.reason,
          triggered_by: write.triggeredBy,
          notes: write.notes,
          metadata: write.metadata,
          entered_at: write.at,
          exited_at: null,
        };
        database.stageHistory.push(record);

        lead.current_outcome_stage = write.newStage;
        lead.outcome_stage_entered_at = write.at;

        return { ...record };
      },

      async getOpenRecord(leadId) {
        const open = database.openRecordsFor(leadId)[0];
        return open ? { ...open } : null;
      },

      async listForLead(leadId) {
        // Array.prototype.sort is stable, so same-millisecond records keep insertion order
        return database.stageHistory
          .filter((r) => r.lead_id === leadId)
          .sort((a, b) => Date.parse(a.entered_at) - Date.parse(b.entered_at))
          .map((r) => ({ ...r }));
      },
    },

    classifications: {
      async create(insert) {
        const record: ClassificationRecord = {
          ...insert,
          id: randomUUID(),
          extracted_dates: [...insert.extracted_dates],
          overridden_by: null,
          overridden_classification: null,
          overridden_at: null,
          created_at: new Date().toISOString(),
        };
        database.classifications.push(record);
        return copyClassification(record);
      },

      async getById(classificationId) {
        const record = database.classifications.find((r) => r.id === classificationId);
        return record ? copyClassification(record) : null;
      },

      async listForLead(leadId) {
        return database.classifications
          .filter((r) => r.lead_id === leadId)
          .reverse()
          .map(copyClassification);
      },

      async applyOverride(classificationId, override) {
        const record = database.classifications.find((r) => r.id === classificationId);
        if (!record) return null;
        Object.assign(record, override);
        return copyClassification(record);
      },
    },

    scoringConfigs: {
      async create(insert) {
        const record: ScoringConfig = {
          id: randomUUID(),
          weights: { ...insert.weights },
          thresholds: { ...insert.thresholds },
          updated_by: insert.updated_by,
          updated_at: new Date().toISOString(),
        };
        database.scoringConfigs.push(record);
        return { ...record, weights: { ...record.weights }, thresholds: { ...record.thresholds } };
      },

      async getLatest() {
        const latest = database.scoringConfigs[database.scoringConfigs.length - 1];
        return latest
          ? { ...latest, weights: { ...latest.weights }, thresholds: { ...latest.thresholds } }
          : null;
      },

      async listRecent(limit) {
        return database.scoringConfigs
          .slice(-limit)
          .reverse()
          .map((c) => ({ ...c, weights: { ...c.weights }, thresholds: { ...c.thresholds } }));
      },
    },

    activityLog: {
      async logActivity(leadId, type, payload) {
        database.activities.push({
          id: randomUUID(),
          lead_id: leadId,
          type,
          payload,
          created_at: new Date().toISOString(),
        });
      },
    },

    notifications: {
      async create(insert) {
        const record: Notification = {
          ...insert,
          id: randomUUID(),
          is_read: false,
          created_at: new Date().toISOString(),
        };
        database.notifications.push(record);
        return { ...record };
      },
    },
  };
}
