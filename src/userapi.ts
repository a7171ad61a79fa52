import router = require('@koa/router');
import multer = require('@koa/multer');
import send = require('koa-send');
import { Database } from 'sqlite';

import { getBoard, getBoards } from './database/boards';
import { appendPost, createThread, findThread, getThread, listThreads } from './database/posts';
import { Board, PostFields } from './database/schema';
import { flashRedirect, rejectTo, takeFlash } from './flash';
import { PostFormSchema, UploadRequestSchema, firstIssue } from './forms';
import { MediaStore } from './media';
import { ApiContext, ApiCustom, ApiState, cappedUpload } from './middleware';
import { boardPage, indexPage, threadPage } from './views';

export interface Deps {
    db: Database;
    media: MediaStore;
    maxBody: number;
}

export let boardUrl = (board: Board) => `/${board.name}/`;
export let threadUrl = (board: Board, thread: number) => `/${board.name}/thread/${thread}`;

// ctx doit être typé explicitement pour que le compilateur voie que ctx.throw ne revient pas
export let orNotFound = <T>(ctx: ApiContext, value: T | undefined, reason: string): T => {
    if (value === undefined)
        ctx.throw(404, reason);
    return value;
};

export let parsePage = (page: string | string[] | undefined) => {
    let n = parseInt(Array.isArray(page) ? page[0] : page ?? '', 10);
    if (Number.isNaN(n) || n < 1)
        return 1;
    return Math.min(n, Number.MAX_SAFE_INTEGER);
};

export let userapi = ({ db, media, maxBody }: Deps) => {
    let api = new router<ApiState, ApiCustom>();

    const uploadhandler = multer({
        limits: {
            fields: 10,
            files: 1,
            parts: 20,
            fileSize: maxBody
        }
    });

    let boardOf = async (ctx: ApiContext, name: string) =>
        orNotFound(ctx, await getBoard(db, name), 'Unknown board');

    api.get('/', async ctx => {
        ctx.body = indexPage(await getBoards(db), takeFlash(ctx));
    });

    api.get('/uploads/:file', async ctx => {
        if (!media.isStoredName(ctx.params.file))
            ctx.throw(404, 'No such file');
        await send(ctx, ctx.params.file, { root: media.dir });
    });

    api.get('/:board([a-z0-9]+)/', async ctx => {
        let board = await boardOf(ctx, ctx.params.board);
        let page = await listThreads(db, board.id, parsePage(ctx.query.page));
        ctx.body = boardPage(board, page, takeFlash(ctx));
    });

    api.get('/:board([a-z0-9]+)/thread/:id(\\d+)', async ctx => {
        let board = await boardOf(ctx, ctx.params.board);
        let { thread, posts } = orNotFound(ctx, await getThread(db, board.id, Number(ctx.params.id)), 'Unknown thread');
        if (posts.length == 0)
            return flashRedirect(ctx, boardUrl(board), 'Thread has no posts');
        ctx.body = threadPage(board, thread, posts, takeFlash(ctx));
    });

    api.post('/:board([a-z0-9]+)/post', cappedUpload(maxBody, uploadhandler.single('file')), async ctx => {
        let board = await boardOf(ctx, ctx.params.board);
        let { body, file } = UploadRequestSchema.parse(ctx.request);
        let form = PostFormSchema.safeParse(body ?? {});
        if (!form.success)
            return flashRedirect(ctx, boardUrl(board), firstIssue(form.error));
        let { thread_id, ...fields } = form.data;

        // on vérifie la cible avant d'écrire le fichier, pour ne pas laisser d'orphelin pour rien
        if (thread_id !== undefined)
            orNotFound(ctx, await findThread(db, board.id, thread_id), 'Unknown thread');

        // extension refusée: le post passe sans fichier
        let post: PostFields = { ...fields, file: file && await media.store(file) };

        if (thread_id === undefined) {
            let created = await createThread(db, board.id, fields.subject, post);
            if (!created.ok)
                return rejectTo(ctx, boardUrl(board), created.error);
            ctx.status = 303;
            return ctx.redirect(threadUrl(board, created.value.thread.id));
        }

        let reply = await appendPost(db, thread_id, post);
        if (!reply.ok)
            return rejectTo(ctx, threadUrl(board, thread_id), reply.error);
        ctx.status = 303;
        ctx.redirect(`${threadUrl(board, thread_id)}#p${reply.value.post_number}`);
    });

    return api;
};
