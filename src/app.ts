import koa = require('koa');
import Static = require('koa-static');

import { adminapi } from './adminapi';
import { ApiCustom, ApiState, accessLog, bodyLimit, errors, formBody } from './middleware';
import { Deps, userapi } from './userapi';

export interface AppDeps extends Deps {
    secret: string;
    frontend: string;
}

export let makeApp = (deps: AppDeps) => {
    let root = new koa<ApiState, ApiCustom>();
    root.proxy = true; // placé derrière un reverse proxy
    root.keys = [deps.secret];

    let admin = adminapi(deps);
    let user = userapi(deps);
    root
        .use(accessLog())
        .use(errors())
        .use(bodyLimit(deps.maxBody))
        .use(formBody(deps.maxBody))
        .use(admin.routes())
        .use(admin.allowedMethods())
        .use(user.routes())
        .use(user.allowedMethods())
        .use(Static(deps.frontend));
    return root;
};
