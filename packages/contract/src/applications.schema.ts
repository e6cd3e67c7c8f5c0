import { z } from 'zod';

export const ApplicationStatusSchema = z.enum(['pending', 'approved', 'accepted', 'rejected']);
export type ApplicationStatus = z.infer<typeof ApplicationStatusSchema>;

/** Raw form body; field-level rules live in the API's application validator. */
export const ApplicationFormSchema = z.record(z.unknown());
export type ApplicationFormDto = z.infer<typeof ApplicationFormSchema>;

/** Normalized answers after validation. */
export const ApplicationAnswersSchema = z.object({
    in_game_name: z.string(),
    age: z.number().int(),
    country: z.string(),
    primary_game: z.string(),
    gameplay_hours: z.number(),
    rank: z.string(),
    experience: z.string(),
    reason: z.string(),
    contribution: z.string(),
    availability: z.number(),
});

export type ApplicationAnswersDto = z.infer<typeof ApplicationAnswersSchema>;

export const ApplicationAnalysisSchema = z.object({
    score: z.number(),
    confidence: z.number(),
    recommendation: z.string(),
    strengths: z.array(z.string()),
    weaknesses: z.array(z.string()),
    breakdown: z.object({
        gameplay_hours: z.number(),
        reason: z.number(),
        contribution: z.number(),
        availability: z.number(),
    }),
});

export type ApplicationAnalysisDto = z.infer<typeof ApplicationAnalysisSchema>;

export const AcceptApplicationSchema = z.object({
    notes: z.string().max(500).optional(),
});

export type AcceptApplicationDto = z.infer<typeof AcceptApplicationSchema>;

export const RejectApplicationSchema = z.object({
    reason: z.string({ required_error: 'Rejection reason must be at least 10 characters' })
        .trim()
        .min(10, 'Rejection reason must be at least 10 characters')
        .max(500),
});

export type RejectApplicationDto = z.infer<typeof RejectApplicationSchema>;

export const ApplicationListQuerySchema = z.object({
    status: ApplicationStatusSchema.optional(),
    page: z.coerce.number().int().min(1).default(1),
    limit: z.coerce.number().int().min(1).max(100).default(20),
});

export type ApplicationListQueryDto = z.infer<typeof ApplicationListQuerySchema>;

export const ApplicationStatsSchema = z.object({
    total: z.number().int(),
    pending: z.number().int(),
    approved: z.number().int(),
    rejected: z.number().int(),
    recent_week: z.number().int(),
    approval_rate: z.number(),
});

export type ApplicationStatsDto = z.infer<typeof ApplicationStatsSchema>;

export const EligibilityReasonSchema = z.enum(['NOT_IN_SERVER', 'ALREADY_MEMBER', 'PENDING', 'COOLDOWN']);
export type EligibilityReason = z.infer<typeof EligibilityReasonSchema>;

/** Response for POST /application-manager/check-eligibility */
export const EligibilitySchema = z.object({
    eligible: z.boolean(),
    reason: EligibilityReasonSchema.optional(),
    message: z.string(),
    action: z.enum(['APPLY', 'JOIN_SERVER', 'WAIT', 'NONE']),
    invite_url: z.string().optional(),
    estimated_time: z.string().optional(),
    days_remaining: z.number().int().optional(),
    can_apply_after: z.string().datetime().optional(),
});

export type EligibilityDto = z.infer<typeof EligibilitySchema>;
