import http = require('http');
import Application = require('koa');
import getRawBody = require('raw-body');
import multerCore = require('multer');

import { errorPage } from './views';

// Le corps des formulaires, posé par formBody ou par multer
export type ApiCustom = Application.DefaultContext & { request: { body?: unknown } };
export type ApiState = Application.DefaultState;
export type ApiContext = Application.ParameterizedContext<ApiState, ApiCustom>;
type ApiMiddleware = Application.Middleware<ApiState, ApiCustom>;

let statusOf = (err: unknown) => {
    if (err instanceof multerCore.MulterError)
        return err.code == 'LIMIT_FILE_SIZE' ? 413 : 400;
    if (typeof err == 'object' && err !== null && 'status' in err && typeof err.status == 'number')
        return err.status;
    return 500;
};

let messageOf = (status: number, err: unknown) => {
    if (status == 413)
        return 'File too large';
    if (status < 500 && err instanceof Error && err.message)
        return err.message;
    return status == 404 ? 'Not Found' : 'Something went wrong';
};

let render = (ctx: ApiContext, status: number, message: string) => {
    ctx.status = status;
    ctx.type = 'html';
    ctx.body = errorPage(status, message);
};

// Page d'erreur pour tout ce qui remonte; rien de l'erreur interne n'est envoyé au client
export let errors = (): ApiMiddleware => async (ctx, next) => {
    try {
        await next();
        if (ctx.status == 404 && ctx.body == null)
            render(ctx, 404, 'Not Found');
    } catch (err) {
        let status = statusOf(err);
        if (status >= 500)
            console.error(`${ctx.method} ${ctx.path} failed:`, err);
        render(ctx, status, messageOf(status, err));
    }
};

export let accessLog = (): ApiMiddleware => async (ctx, next) => {
    let start = Date.now();
    try {
        await next();
    } finally {
        console.log(`${ctx.method} ${ctx.path} ${ctx.status} ${Date.now() - start}ms`);
    }
};

// Refusé avant de lire quoi que ce soit, et donc avant d'écrire le moindre fichier
export let bodyLimit = (max: number): ApiMiddleware => (ctx, next) => {
    let length = Number(ctx.request.get('content-length'));
    if (length > max)
        ctx.throw(413, 'File too large');
    return next();
};

/*
    Envoyé en chunked, un corps n'a pas de Content-Length: sa taille ne se sait qu'en le lisant.
    Le parseur lit une copie comptée de la requête, coupée net au-delà de max:
    le formulaire tronqué fait échouer le parseur avant que le handler n'écrive quoi que ce soit.
*/
let countedCopy = (req: http.IncomingMessage, max: number) => {
    let copy = new http.IncomingMessage(req.socket);
    copy.headers = req.headers;
    let seen = 0;
    // complete doit être vrai à la fin, sinon détruire la copie ferme la socket du client
    let finish = () => {
        if (copy.complete)
            return;
        copy.complete = true;
        copy.push(null);
    };
    req.on('data', (chunk: Buffer) => {
        if (copy.complete)
            return;
        seen += chunk.length;
        if (seen > max)
            finish();
        else
            copy.push(chunk);
    });
    req.on('end', finish);
    req.on('close', finish);
    return { copy, tooLarge: () => seen > max };
};

export let cappedUpload = (max: number, upload: ApiMiddleware): ApiMiddleware => async (ctx, next) => {
    if (!ctx.request.is('multipart'))
        return upload(ctx, next);
    let source = ctx.req;
    let { copy, tooLarge } = countedCopy(source, max);
    let refuse = () => {
        if (tooLarge())
            ctx.throw(413, 'File too large');
    };
    ctx.req = copy;
    try {
        await upload(ctx, () => {
            ctx.req = source;
            refuse();
            return next();
        });
    } catch (err) {
        refuse();
        throw err;
    } finally {
        ctx.req = source;
    }
};

// Les formulaires urlencoded; le multipart est laissé à multer
export let formBody = (limit: number): ApiMiddleware => async (ctx, next) => {
    if (ctx.request.is('application/x-www-form-urlencoded')) {
        let raw = await getRawBody(ctx.req, { limit, encoding: 'utf-8' });
        ctx.request.body = Object.fromEntries(new URLSearchParams(raw));
    }
    return next();
};
