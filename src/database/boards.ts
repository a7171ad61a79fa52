import { Database } from 'sqlite';

import { BoardForm, BoardFormSchema, firstIssue } from '../forms';
import { Outcome, accept, reject } from '../outcome';
import { transaction } from './connection';
import { Board } from './schema';

export const defaultBoards: BoardForm[] = [
    { name: 'b', title: 'Random', description: 'Random discussions' },
    { name: 'g', title: 'Technology', description: 'Technology discussions' },
    { name: 'v', title: 'Video Games', description: 'Video game discussions' },
];

export let getBoard = (db: Database, name: string) =>
    db.get<Board>('SELECT * FROM boards WHERE name = ?', name);

export let getBoardById = (db: Database, id: number) =>
    db.get<Board>('SELECT * FROM boards WHERE id = ?', id);

export let getBoards = (db: Database) =>
    db.all<Board[]>('SELECT * FROM boards ORDER BY name');

export let countBoards = async (db: Database) => {
    let row = await db.get<{ c: number }>('SELECT COUNT(*) AS c FROM boards');
    return row?.c ?? 0;
};

let insertBoard = async (db: Database, settings: BoardForm): Promise<Board> => {
    let res = await db.run(
        'INSERT INTO boards (name, title, description) VALUES (?, ?, ?)',
        settings.name, settings.title, settings.description);
    if (res.lastID === undefined)
        throw new Error('Board insert returned no id');
    return { id: res.lastID, ...settings };
};

// Les règles du formulaire valent aussi pour les appels directs
export let createBoard = (db: Database, settings: BoardForm): Promise<Outcome<Board>> => {
    let form = BoardFormSchema.safeParse(settings);
    if (!form.success)
        return Promise.resolve(reject('validation', firstIssue(form.error)));
    let board = form.data;
    return transaction(db, async () => {
        if (await getBoard(db, board.name))
            return reject('conflict', 'Board already exists');
        return accept(await insertBoard(db, board));
    });
};

// Pas de ON DELETE CASCADE dans le schéma: on descend à la main, posts puis fils puis board
export let deleteBoard = (db: Database, name: string): Promise<Outcome<Board>> =>
    transaction(db, async () => {
        let board = await getBoard(db, name);
        if (!board)
            return reject('not_found', 'No such board');
        await db.run(
            'DELETE FROM posts WHERE thread_id IN (SELECT id FROM threads WHERE board_id = ?)',
            board.id);
        await db.run('DELETE FROM threads WHERE board_id = ?', board.id);
        await db.run('DELETE FROM boards WHERE id = ?', board.id);
        return accept(board);
    });

/**
 * Crée les boards par défaut au premier démarrage.
 * Renvoie le nombre de boards créés (0 si la base en contenait déjà).
 */
export let seedBoards = (db: Database) =>
    transaction(db, async () => {
        if (await countBoards(db) > 0)
            return 0;
        for (let board of defaultBoards)
            await insertBoard(db, board);
        return defaultBoards.length;
    });
