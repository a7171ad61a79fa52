import Application = require('koa');

import { Rejection } from './outcome';

type Context = Application.ParameterizedContext;

const cookie = 'flash';

// Le message survit à une redirection, dans un cookie signé (app.keys)
export let flashRedirect = (ctx: Context, url: string, message: string) => {
    ctx.cookies.set(cookie, encodeURIComponent(message), { signed: true, httpOnly: true, sameSite: 'lax' });
    ctx.status = 303;
    ctx.redirect(url);
};

export let rejectTo = (ctx: Context, url: string, error: Rejection) => {
    if (error.kind == 'not_found')
        ctx.throw(404, error.reason);
    flashRedirect(ctx, url, error.reason);
};

// Lu une fois puis effacé
export let takeFlash = (ctx: Context) => {
    let value = ctx.cookies.get(cookie, { signed: true });
    if (value === undefined)
        return undefined;
    ctx.cookies.set(cookie, null, { signed: true });
    return decodeURIComponent(value);
};
