import path = require('path');

export type Settings = ReturnType<typeof loadSettings>;

// Alias accepté pour sqlite://
const schemeAliases: { [k in string]: string } = {
    'sqlite3://': 'sqlite://',
};

/*
    sqlite:///chan.db       -> chan.db
    sqlite:////var/chan.db  -> /var/chan.db
    sqlite:///:memory:      -> :memory:
    un chemin sans schéma est passé tel quel au pilote
*/
export let normalizeDatabaseUrl = (url: string) => {
    for (let alias in schemeAliases)
        if (url.startsWith(alias))
            url = schemeAliases[alias] + url.slice(alias.length);
    if (!url.includes('://'))
        return url;
    if (!url.startsWith('sqlite://'))
        throw new Error(`Unsupported database url: ${url.split('://')[0]}://`);
    let filename = url.slice('sqlite://'.length);
    if (filename.startsWith('/'))
        filename = filename.slice(1);
    if (!filename)
        throw new Error('Database url names no file');
    return filename;
};

let parsePort = (port: string | undefined) => {
    if (port === undefined || port == '')
        return 5000;
    let n = Number(port);
    if (!Number.isInteger(n) || n < 0 || n > 65535)
        throw new Error(`Invalid PORT: ${port}`);
    return n;
};

export let loadSettings = (env: NodeJS.ProcessEnv) => ({
    dbfile: normalizeDatabaseUrl(env.DATABASE_URL || 'sqlite:///imageboard.db'),
    initdb: path.resolve(env.INIT_SQL || 'init.sql'),
    // clé de signature des cookies (flash)
    secret: env.SECRET || 'change-me',
    port: parsePort(env.PORT),
    uploads: env.UPLOAD_DIR || path.join('static', 'uploads'),
    frontend: env.STATIC_DIR || 'static',
    // taille maximale d'une requête, fichier compris
    maxBody: 5 * 1024 * 1024,
});

export let settings = loadSettings(process.env);
