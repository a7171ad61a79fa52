import { Database } from 'sqlite';

import { ThreadFlags } from '../forms';
import { Outcome, accept, reject } from '../outcome';
import { serialized, transaction } from './connection';
import * as schema from './schema';

export const previewSize = 5;
export const threadsPerPage = 10;

export let nextNumber = async (db: Database, thread: number) => {
    let row = await db.get<{ last: number | null }>(
        'SELECT MAX(post_number) AS last FROM posts WHERE thread_id = ?', thread);
    return (row?.last ?? 0) + 1;
};

let getThreadRow = async (db: Database, id: number) => {
    let row = await db.get<schema.ThreadRow>('SELECT * FROM threads WHERE id = ?', id);
    return row && schema.toThread(row);
};

let insertPost = async (db: Database, thread: number, number: number, fields: schema.PostFields, now: number) => {
    let res = await db.run(
        `INSERT INTO posts (thread_id, post_number, name, email, subject, comment,
            filename, original_filename, file_size, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        thread, number, fields.name, fields.email, fields.subject, fields.comment,
        fields.file?.filename ?? null, fields.file?.original_filename ?? null, fields.file?.file_size ?? null,
        now);
    let post = await db.get<schema.Post>('SELECT * FROM posts WHERE id = ?', res.lastID);
    if (!post)
        throw new Error('Inserted post vanished');
    return post;
};

/**
 * Ouvre un fil avec son premier post (numéro 1).
 * Le fil et l'OP sont insérés dans la même transaction: aucun lecteur ne voit de fil vide.
 */
export let createThread = (db: Database, board: number, subject: string, op: schema.PostFields)
    : Promise<Outcome<{ thread: schema.Thread, post: schema.Post }>> => {
    if (!subject && !op.comment && !op.file)
        return Promise.resolve(reject('validation', 'Thread must have subject, comment, or image'));
    return transaction(db, async () => {
        let b = await db.get<{ id: number }>('SELECT id FROM boards WHERE id = ?', board);
        if (!b)
            return reject('not_found', 'Unknown board');
        let now = Date.now();
        let res = await db.run(
            'INSERT INTO threads (board_id, subject, created_at, bumped_at) VALUES (?, ?, ?, ?)',
            board, subject || 'No Subject', now, now);
        if (res.lastID === undefined)
            throw new Error('Thread insert returned no id');
        let post = await insertPost(db, res.lastID, 1, op, now);
        let thread = await getThreadRow(db, res.lastID);
        if (!thread)
            throw new Error('Inserted thread vanished');
        return accept({ thread, post });
    });
};

/*
    Le verrou, le numéro et le bump sont lus et écrits dans la même transaction,
    et les transactions sont sérialisées: deux réponses simultanées ne peuvent pas
    obtenir le même numéro (l'index unique (thread_id, post_number) reste en filet).
*/
export let appendPost = (db: Database, thread: number, reply: schema.PostFields): Promise<Outcome<schema.Post>> =>
    transaction(db, async () => {
        let t = await getThreadRow(db, thread);
        if (!t)
            return reject('not_found', 'Unknown thread');
        if (t.is_locked)
            return reject('locked', 'Thread is locked');
        let number = await nextNumber(db, thread);
        // l'horloge peut reculer, bumped_at non
        let now = Math.max(Date.now(), t.bumped_at);
        await db.run('UPDATE threads SET bumped_at = ? WHERE id = ?', now, thread);
        return accept(await insertPost(db, thread, number, reply, now));
    });

let getPosts = (db: Database, thread: number, limit = -1) =>
    db.all<schema.Post[]>(
        'SELECT * FROM posts WHERE thread_id = ? ORDER BY created_at ASC, post_number ASC LIMIT ?',
        thread, limit);

let countPosts = async (db: Database, thread: number) => {
    let row = await db.get<{ c: number }>('SELECT COUNT(*) AS c FROM posts WHERE thread_id = ?', thread);
    return row?.c ?? 0;
};

// Un fil n'est visible que sous son propre board
export let findThread = async (db: Database, board: number, id: number) => {
    let thread = await getThreadRow(db, id);
    return thread && thread.board_id == board ? thread : undefined;
};

export let getThread = (db: Database, board: number, id: number) =>
    serialized(db, async () => {
        let thread = await findThread(db, board, id);
        if (!thread)
            return undefined;
        return { thread, posts: await getPosts(db, id) };
    });

/**
 * Une page de la liste des fils d'un board: épinglés d'abord, puis du plus récemment bumpé au plus ancien.
 * Chaque fil vient avec ses premiers posts et son nombre total de posts.
 */
export let listThreads = (db: Database, board: number, page: number, pageSize = threadsPerPage)
    : Promise<schema.ThreadPage> =>
    serialized(db, async () => {
        page = Math.max(1, Math.floor(page));
        let offset = (page - 1) * pageSize;
        // SQLite refuse un OFFSET qui n'est pas un entier exact; aussi loin, la page est vide
        if (!Number.isSafeInteger(offset))
            return { items: [], page, hasMore: false };
        // un de plus que la page pour savoir s'il en reste
        let rows = await db.all<schema.ThreadRow[]>(
            `SELECT * FROM threads WHERE board_id = ?
             ORDER BY is_pinned DESC, bumped_at DESC, id DESC
             LIMIT ? OFFSET ?`,
            board, pageSize + 1, offset);
        let items: schema.ThreadSummary[] = [];
        for (let row of rows.slice(0, pageSize)) {
            items.push({
                thread: schema.toThread(row),
                preview: await getPosts(db, row.id, previewSize),
                total: await countPosts(db, row.id),
            });
        }
        return { items, page, hasMore: rows.length > pageSize };
    });

export let setThreadFlags = (db: Database, id: number, flags: ThreadFlags): Promise<Outcome<schema.Thread>> =>
    transaction(db, async () => {
        let thread = await getThreadRow(db, id);
        if (!thread)
            return reject('not_found', 'Unknown thread');
        let is_pinned = flags.pinned ?? thread.is_pinned;
        let is_locked = flags.locked ?? thread.is_locked;
        await db.run('UPDATE threads SET is_pinned = ?, is_locked = ? WHERE id = ?',
            is_pinned ? 1 : 0, is_locked ? 1 : 0, id);
        return accept({ ...thread, is_pinned, is_locked });
    });
