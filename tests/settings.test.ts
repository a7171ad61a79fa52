import { describe, it, expect } from 'vitest';
import path = require('path');

import { loadSettings, normalizeDatabaseUrl } from '../src/settings';

describe('normalizeDatabaseUrl', () => {
    it.each([
        ['sqlite:///imageboard.db', 'imageboard.db'],
        ['sqlite:////var/lib/chan/chan.db', '/var/lib/chan/chan.db'],
        ['sqlite:///:memory:', ':memory:'],
        ['sqlite3:///imageboard.db', 'imageboard.db'],
        ['sqlite3:////srv/chan.db', '/srv/chan.db'],
        ['data/chan.db', 'data/chan.db'],
        [':memory:', ':memory:'],
    ])('maps %s to %s', (url, filename) => {
        expect(normalizeDatabaseUrl(url)).toBe(filename);
    });

    it('rejects other database schemes', () => {
        expect(() => normalizeDatabaseUrl('postgres://db/chan')).toThrow('Unsupported database url: postgres://');
    });

    it('rejects a url without a file', () => {
        expect(() => normalizeDatabaseUrl('sqlite:///')).toThrow('Database url names no file');
    });
});

describe('loadSettings', () => {
    it('falls back to defaults', () => {
        let s = loadSettings({});

        expect(s.dbfile).toBe('imageboard.db');
        expect(s.port).toBe(5000);
        expect(s.uploads).toBe(path.join('static', 'uploads'));
        expect(s.frontend).toBe('static');
        expect(s.initdb).toBe(path.resolve('init.sql'));
        expect(s.maxBody).toBe(5 * 1024 * 1024);
    });

    it('reads the environment', () => {
        let s = loadSettings({
            DATABASE_URL: 'sqlite3:////tmp/chan.db',
            PORT: '8080',
            UPLOAD_DIR: '/srv/uploads',
            SECRET: 'test-secret',
        });

        expect(s.dbfile).toBe('/tmp/chan.db');
        expect(s.port).toBe(8080);
        expect(s.uploads).toBe('/srv/uploads');
        expect(s.secret).toBe('test-secret');
    });

    it('rejects a port that is not a number', () => {
        expect(() => loadSettings({ PORT: 'http' })).toThrow('Invalid PORT: http');
    });
});
