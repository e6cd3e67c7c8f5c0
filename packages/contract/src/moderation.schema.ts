import { z } from 'zod';

export const AnalyzeContentSchema = z.object({
    content: z.string().min(1).max(4000),
    user_id: z.string().optional(),
});

export type AnalyzeContentDto = z.infer<typeof AnalyzeContentSchema>;

export const ModerationActionSchema = z.enum(['none', 'flag', 'warn', 'ban']);
export type ModerationAction = z.infer<typeof ModerationActionSchema>;

export const ViolationSchema = z.enum(['spam', 'toxicity', 'advertising']);
export type Violation = z.infer<typeof ViolationSchema>;

export const ContentAnalysisSchema = z.object({
    is_spam: z.boolean(),
    is_toxic: z.boolean(),
    is_advertising: z.boolean(),
    confidence: z.number(),
    flagged_words: z.array(z.string()),
    violations: z.array(ViolationSchema),
    action: ModerationActionSchema,
});

export type ContentAnalysisDto = z.infer<typeof ContentAnalysisSchema>;

export const CreateWarningSchema = z.object({
    user_id: z.string().min(1),
    reason: z.string().trim().min(3).max(500),
    severity: z.enum(['low', 'medium', 'high']).default('low'),
});

export type CreateWarningDto = z.infer<typeof CreateWarningSchema>;

export const WarningSchema = z.object({
    id: z.string(),
    user_id: z.string(),
    reason: z.string(),
    severity: z.enum(['low', 'medium', 'high']),
    issued_by: z.string(),
    timestamp: z.string().datetime(),
});

export type WarningDto = z.infer<typeof WarningSchema>;

/** Body for POST /moderation/analyze-application */
export const ApplicationReviewInputSchema = z.record(z.union([z.string(), z.number()]));
export type ApplicationReviewInputDto = z.infer<typeof ApplicationReviewInputSchema>;

export const ApplicationReviewSchema = z.object({
    score: z.number(),
    recommendation: z.enum(['approve', 'review', 'reject']),
    factors: z.array(z.string()),
});

export type ApplicationReviewDto = z.infer<typeof ApplicationReviewSchema>;
