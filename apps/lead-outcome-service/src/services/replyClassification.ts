import { ActivityLog, ClassificationStore, LeadStore } from "../db/types";
import { NotFoundError } from "../errors";
import { ClassificationRecord, ReplyClassification } from "../types/outcomes";
import { Classifier } from "./replyClassifier";

const MAX_STORED_BODY = 2000;

export interface ReplyClassificationServiceDeps {
  leads: LeadStore;
  classifications: ClassificationStore;
  activityLog: ActivityLog;
  classifier: Classifier;
  now?: () => Date;
}

/**
 * Classifies inbound replies and keeps the audit trail of machine and
 * human decisions
 */
export class ReplyClassificationService {
  private readonly now: () => Date;

  constructor(private readonly deps: ReplyClassificationServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async classify(
    leadId: string,
    replyBody: string,
    senderEmail: string | null = null
  ): Promise<ClassificationRecord> {
    const lead = await this.deps.leads.getById(leadId);
    if (!lead) {
      throw new NotFoundError("Lead", leadId);
    }

    const result = await this.deps.classifier.classify(replyBody, lead);

    const record = await this.deps.classifications.create({
      lead_id: leadId,
      reply_body: replyBody.slice(0, MAX_STORED_BODY),
      classification: result.classification,
      confidence: result.confidence,
      reasoning: result.reasoning,
      extracted_dates: result.extracted_dates,
      is_auto_reply: result.is_auto_reply,
    });

    await this.deps.activityLog.logActivity(leadId, "REPLY_CLASSIFIED", {
      classification: result.classification,
      confidence: result.confidence,
      is_auto_reply: result.is_auto_reply,
      sender_email: senderEmail,
    });

    console.log(`[replyClassification] Reply classified`, {
      lead_id: leadId,
      classification: result.classification,
      confidence: result.confidence,
    });

    return record;
  }

  /**
   * Record a human correction. The machine classification is kept; the
   * override fields are replaced on every call.
   */
  async override(
    classificationId: string,
    newClassification: ReplyClassification,
    overriddenBy: string
  ): Promise<ClassificationRecord> {
    const record = await this.deps.classifications.applyOverride(classificationId, {
      overridden_by: overriddenBy,
      overridden_classification: newClassification,
      overridden_at: this.now().toISOString(),
    });
    if (!record) {
      throw new NotFoundError("Classification", classificationId);
    }

    await this.deps.activityLog.logActivity(record.lead_id, "CLASSIFICATION_OVERRIDDEN", {
      classification_id: classificationId,
      original_classification: record.classification,
      new_classification: newClassification,
      overridden_by: overriddenBy,
    });

    console.log(`[replyClassification] Classification overridden`, {
      classification_id: classificationId,
      new_classification: newClassification,
    });

    return record;
  }

  async latestForLead(leadId: string): Promise<ClassificationRecord | null> {
    const records = await this.deps.classifications.listForLead(leadId);
    return records[0] ?? null;
  }

  async listForLead(leadId: string): Promise<ClassificationRecord[]> {
    return this.deps.classifications.listForLead(leadId);
  }
}
