import type { ObjectId } from 'mongodb';
import type {
  ApplicationAnalysisDto,
  ApplicationAnswersDto,
  ApplicationStatus,
} from '@maestros/contract';

export type DmDeliveryStatus = 'sent' | 'failed';

/** Shape of a document in the `applications` collection. */
export interface ApplicationDocument {
  _id: ObjectId;
  /** Applicant discord id */
  user_id: string;
  username: string;
  form_type: 'membership';
  data: ApplicationAnswersDto;
  status: ApplicationStatus;
  submitted_at: Date;
  result_score: number;
  ai_analysis: ApplicationAnalysisDto;

  reviewed_at?: Date;
  reviewed_by?: string;
  reviewer_name?: string;
  review_notes?: string;

  handled_by?: string;
  handler_name?: string;
  decision_timestamp?: Date;
  decision_reason?: string;

  override_by_ceo?: boolean;
  override_expires_at?: Date;
  override_granted_by?: string;
  override_granted_at?: Date;

  dm_delivery_status?: DmDeliveryStatus;
  discord_user_info?: {
    username: string;
    global_name: string | null;
    avatar: string | null;
  };
}

export type NewApplicationDocument = Omit<ApplicationDocument, '_id'>;

/** Flattened JSON view: ObjectId and dates as strings, answers spread at the top level. */
export interface ApplicationView extends ApplicationAnswersDto {
  id: string;
  user_id: string;
  username: string;
  status: ApplicationStatus;
  submitted_at: string;
  result_score: number;
  ai_analysis: ApplicationAnalysisDto;
  reviewed_at: string | null;
  reviewed_by: string | null;
  reviewer_name: string | null;
  review_notes: string | null;
  handler_name: string | null;
  decision_reason: string | null;
  dm_delivery_status: DmDeliveryStatus | null;
}

export function toApplicationView(doc: ApplicationDocument): ApplicationView {
  return {
    ...doc.data,
    id: doc._id.toHexString(),
    user_id: doc.user_id,
    username: doc.username,
    status: doc.status,
    submitted_at: doc.submitted_at.toISOString(),
    result_score: doc.result_score,
    ai_analysis: doc.ai_analysis,
    reviewed_at: doc.reviewed_at?.toISOString() ?? null,
    reviewed_by: doc.reviewed_by ?? null,
    reviewer_name: doc.reviewer_name ?? null,
    review_notes: doc.review_notes ?? null,
    handler_name: doc.handler_name ?? null,
    decision_reason: doc.decision_reason ?? null,
    dm_delivery_status: doc.dm_delivery_status ?? null,
  };
}
