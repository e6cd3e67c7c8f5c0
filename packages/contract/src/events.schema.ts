import { z } from 'zod';

export const EventStatusSchema = z.enum(['upcoming', 'ongoing', 'completed', 'cancelled']);
export type EventStatus = z.infer<typeof EventStatusSchema>;

const eventDate = z
    .string({ required_error: 'Date is required' })
    .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Invalid date format' });

export const CreateEventSchema = z.object({
    title: z.string({ required_error: 'Title is required' })
        .trim()
        .min(5, 'Title must be at least 5 characters')
        .max(100, 'Title must be at most 100 characters'),
    description: z.string({ required_error: 'Description is required' })
        .trim()
        .min(20, 'Description must be at least 20 characters'),
    game: z.string({ required_error: 'Game is required' }).trim().min(1, 'Game is required'),
    date: eventDate.refine((value) => Date.parse(value) > Date.now(), {
        message: 'Event date must be in the future',
    }),
    max_participants: z.coerce.number({ required_error: 'Max participants is required' })
        .int()
        .min(2, 'Must allow at least 2 participants')
        .max(1000, 'Maximum 1000 participants allowed'),
    prize: z.string().max(200).optional(),
});

export type CreateEventDto = z.infer<typeof CreateEventSchema>;

export const UpdateEventSchema = z.object({
    title: z.string().trim().min(5, 'Title must be at least 5 characters').max(100).optional(),
    description: z.string().trim().min(20, 'Description must be at least 20 characters').optional(),
    game: z.string().trim().min(1).optional(),
    date: eventDate.optional(),
    max_participants: z.coerce.number().int().min(2, 'Must allow at least 2 participants')
        .max(1000, 'Maximum 1000 participants allowed').optional(),
    prize: z.string().max(200).optional(),
    status: EventStatusSchema.optional(),
    winners: z.array(z.string()).optional(),
});

export type UpdateEventDto = z.infer<typeof UpdateEventSchema>;

export const EventListQuerySchema = z.object({
    status: EventStatusSchema.optional(),
    limit: z.coerce.number().int().min(1).max(100).default(10),
});

export type EventListQueryDto = z.infer<typeof EventListQuerySchema>;

export const EventSchema = z.object({
    id: z.string(),
    title: z.string(),
    description: z.string(),
    game: z.string(),
    date: z.string().datetime(),
    max_participants: z.number().int(),
    prize: z.string().nullable(),
    participants: z.array(z.string()),
    winners: z.array(z.string()),
    status: EventStatusSchema,
    created_by: z.string().nullable(),
    created_at: z.string().datetime(),
});

export type EventDto = z.infer<typeof EventSchema>;

export const EventRegistrationSchema = z.object({
    message: z.string(),
    event_id: z.string(),
    spots_remaining: z.number().int(),
});

export type EventRegistrationDto = z.infer<typeof EventRegistrationSchema>;
