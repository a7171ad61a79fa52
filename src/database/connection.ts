import fs = require('fs');
import sqlite3 = require('sqlite3');
import { open, Database } from 'sqlite';

let fsp = fs.promises;

export let openDatabase = async (filename: string) => {
    let db = await open({ filename, driver: sqlite3.Database });
    await db.exec('PRAGMA foreign_keys = ON;');
    return db;
};

export let initDb = async (db: Database, script: string) => {
    let q = await db.all<{ name: string }[]>(`SELECT name FROM sqlite_master WHERE type='table';`);
    if (['boards', 'threads', 'posts'].every(t => q.some(r => r.name == t)))
        return;
    let scr = await fsp.readFile(script);
    await db.exec(scr.toString());
};

// Une seule connexion est partagée par toutes les requêtes: les transactions passent
// l'une après l'autre (sinon BEGIN échoue), et les lectures en plusieurs requêtes
// attendent leur tour pour ne jamais voir une transaction à moitié faite
let queues = new WeakMap<Database, Promise<void>>();

export let serialized = <T>(db: Database, work: () => Promise<T>): Promise<T> => {
    let previous = queues.get(db) ?? Promise.resolve();
    let run = previous.then(work);
    // la file ne doit pas rester bloquée par un échec, l'appelant le reçoit via `run`
    queues.set(db, run.then(() => undefined, () => undefined));
    return run;
};

export let transaction = <T>(db: Database, work: () => Promise<T>): Promise<T> =>
    serialized(db, async () => {
        await db.exec('BEGIN IMMEDIATE');
        try {
            let result = await work();
            await db.exec('COMMIT');
            return result;
        } catch (e) {
            await db.exec('ROLLBACK');
            throw e;
        }
    });
