import path = require('path');
import { Database } from 'sqlite';

import { createBoard } from '../src/database/boards';
import { initDb, openDatabase } from '../src/database/connection';
import { Board, PostFields } from '../src/database/schema';

export const initSql = path.resolve(__dirname, '..', 'init.sql');

// Base SQLite en mémoire, propre à chaque test
export let makeDb = async () => {
    let db = await openDatabase(':memory:');
    await initDb(db, initSql);
    return db;
};

export let makeBoard = async (db: Database, name = 'b', title = 'Random'): Promise<Board> => {
    let res = await createBoard(db, { name, title, description: '' });
    if (!res.ok)
        throw new Error(res.error.reason);
    return res.value;
};

export let makeFields = (overrides: Partial<PostFields> = {}): PostFields => ({
    name: 'Anonymous',
    email: '',
    subject: '',
    comment: 'hello',
    ...overrides,
});
