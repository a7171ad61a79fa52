import { z } from 'zod';

// Les champs absents d'un formulaire HTML arrivent vides ou pas du tout
let field = (max: number) =>
    z.string().optional().transform(s => (s ?? '').substring(0, max));

export const PostFormSchema = z.object({
    name: field(100).transform(s => s.trim() || 'Anonymous'),
    email: field(100),
    subject: field(200),
    comment: z.string().optional().transform(s => (s ?? '').replace(/\r\n?/g, '\n').substring(0, 2000)),
    thread_id: z.string().optional().transform((s, ctx) => {
        if (s === undefined || s.trim() == '')
            return undefined;
        let id = Number(s);
        if (!Number.isSafeInteger(id) || id < 1) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid thread id' });
            return z.NEVER;
        }
        return id;
    }),
});

// admin et uploads sont déjà des préfixes de routes
const reservedNames = ['admin', 'uploads'];

export const BoardFormSchema = z.object({
    name: z.string({ required_error: 'Board name is required' })
        .trim()
        .min(1, 'Board name is required')
        .max(10, 'Board name is too long')
        .regex(/^[a-z0-9]+$/, 'Board name may only contain lowercase letters and digits')
        .refine(n => !reservedNames.includes(n), 'This board name is reserved'),
    title: z.string({ required_error: 'Board title is required' })
        .trim()
        .min(1, 'Board title is required')
        .max(100, 'Board title is too long'),
    description: z.string().optional().transform(s => s ?? ''),
});

let flag = z.string().optional().transform(s => s === undefined ? undefined : ['on', '1', 'true'].includes(s));

export const ThreadFlagsSchema = z.object({
    pinned: flag,
    locked: flag,
});

// Ce que multer laisse sur la requête (stockage mémoire)
export const UploadRequestSchema = z.object({
    body: z.unknown(),
    file: z.object({
        originalname: z.string(),
        buffer: z.instanceof(Buffer),
    }).optional(),
});

export type PostForm = z.infer<typeof PostFormSchema>;
export type BoardForm = z.infer<typeof BoardFormSchema>;
export type ThreadFlags = z.infer<typeof ThreadFlagsSchema>;

export let firstIssue = (error: z.ZodError) =>
    error.issues[0]?.message ?? 'Malformed data';
