import router = require('@koa/router');
import { Database } from 'sqlite';

import { createBoard, deleteBoard, getBoardById } from './database/boards';
import { setThreadFlags } from './database/posts';
import { flashRedirect, rejectTo, takeFlash } from './flash';
import { BoardFormSchema, ThreadFlagsSchema, firstIssue } from './forms';
import { ApiCustom, ApiState } from './middleware';
import { boardUrl, orNotFound, threadUrl } from './userapi';
import { createBoardPage } from './views';

/*
    Pas d'authentification: l'administration est ouverte, comme la création de board d'origine.
    Routes en POST seulement pour les changements d'état, les formulaires HTML ne savent pas faire mieux.
*/
export let adminapi = ({ db }: { db: Database }) => {
    let api = new router<ApiState, ApiCustom>({ prefix: '/admin' });

    api.get('/create_board', ctx => {
        ctx.body = createBoardPage(takeFlash(ctx));
    });

    api.post('/create_board', async ctx => {
        let form = BoardFormSchema.safeParse(ctx.request.body ?? {});
        if (!form.success)
            return flashRedirect(ctx, '/admin/create_board', firstIssue(form.error));
        let res = await createBoard(db, form.data);
        if (!res.ok)
            return rejectTo(ctx, '/admin/create_board', res.error);
        flashRedirect(ctx, boardUrl(res.value), 'Board created successfully');
    });

    api.post('/threads/:id(\\d+)', async ctx => {
        let form = ThreadFlagsSchema.safeParse(ctx.request.body ?? {});
        if (!form.success)
            return ctx.throw(400, firstIssue(form.error));
        let res = await setThreadFlags(db, Number(ctx.params.id), form.data);
        if (!res.ok)
            return rejectTo(ctx, '/', res.error);
        let board = orNotFound(ctx, await getBoardById(db, res.value.board_id), 'Unknown board');
        flashRedirect(ctx, threadUrl(board, res.value.id), 'Thread updated');
    });

    api.post('/boards/:name/delete', async ctx => {
        let res = await deleteBoard(db, ctx.params.name);
        if (!res.ok)
            return rejectTo(ctx, '/', res.error);
        flashRedirect(ctx, '/', `Board /${res.value.name}/ deleted`);
    });

    return api;
};
