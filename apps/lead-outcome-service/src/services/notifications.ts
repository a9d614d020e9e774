import { NotificationStore } from "../db/types";
import { Notification, ReplyClassification } from "../types/outcomes";

const PREVIEW_LENGTH = 200;

export interface ReplyClassifiedNotice {
  leadId: string;
  classification: ReplyClassification;
  replyPreview: string;
  leadName: string;
}

export interface DemoRequestedNotice {
  leadId: string;
  schedulingLink: string | null;
  extractedDates: string[];
  leadName: string;
}

/**
 * In-app notifications for the sales team
 */
export class NotificationService {
  constructor(private readonly store: NotificationStore) {}

  async notifyReplyClassified(notice: ReplyClassifiedNotice): Promise<Notification> {
    const preview = notice.replyPreview.slice(0, PREVIEW_LENGTH);

    return this.store.create({
      lead_id: notice.leadId,
      type: "reply_classified",
      title: `Reply classified: ${notice.classification}`,
      body: `Lead ${notice.leadName} replied. Classification: ${notice.classification}. Preview: ${preview}`,
      metadata: { classification: notice.classification },
    });
  }

  async notifyDemoRequested(notice: DemoRequestedNotice): Promise<Notification> {
    const bodyParts = [`Lead ${notice.leadName} wants to book a demo.`];
    if (notice.extractedDates.length > 0) {
      bodyParts.push(`Suggested dates: ${notice.extractedDates.join(", ")}`);
    }
    if (notice.schedulingLink) {
      bodyParts.push(`Scheduling link: ${notice.schedulingLink}`);
    }

    return this.store.create({
      lead_id: notice.leadId,
      type: "demo_requested",
      title: notice.leadName ? `Demo requested by ${notice.leadName}` : "Demo requested",
      body: bodyParts.join(" "),
      metadata: {
        scheduling_link: notice.schedulingLink,
        extracted_dates: notice.extractedDates,
        priority: "high",
      },
    });
  }
}
