import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs = require('fs');
import os = require('os');
import path = require('path');

import { MediaStore, extensionOf, secureFilename, storageName } from '../src/media';

let fsp = fs.promises;
let dir: string;
let media: MediaStore;

beforeEach(async () => {
    dir = await fsp.mkdtemp(path.join(os.tmpdir(), 'chanboard-media-'));
    media = new MediaStore(path.join(dir, 'uploads'));
    await media.init();
});

afterEach(async () => {
    await fsp.rm(dir, { recursive: true, force: true });
});

describe('extensionOf', () => {
    it.each([
        ['cat.png', 'png'],
        ['CAT.JPEG', 'jpeg'],
        ['archive.tar.gz', 'gz'],
        ['.webm', 'webm'],
        ['trailing.', ''],
        ['noext', undefined],
    ])('%s -> %s', (name, ext) => {
        expect(extensionOf(name)).toBe(ext);
    });
});

describe('secureFilename', () => {
    it.each([
        ['My cat.png', 'My_cat.png'],
        ['../../etc/passwd.png', 'etc_passwd.png'],
        ['C:\\Users\\me\\dog.gif', 'C_Users_me_dog.gif'],
        ['café.jpg', 'cafe.jpg'],
        ['<script>.png', 'script.png'],
        ['日本.png', 'png'],
    ])('%s -> %s', (name, secured) => {
        expect(secureFilename(name)).toBe(secured);
    });
});

describe('storageName', () => {
    it('is twelve hex characters and the extension', () => {
        expect(storageName('png')).toMatch(/^[0-9a-f]{12}\.png$/);
    });

    it('does not repeat', () => {
        let names = new Set(Array.from({ length: 200 }, () => storageName('gif')));
        expect(names.size).toBe(200);
    });
});

describe('MediaStore.store', () => {
    it('writes an allowed file byte for byte', async () => {
        let buffer = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 1, 2, 3]);

        let stored = await media.store({ originalname: 'My Cat.PNG', buffer });

        expect(stored).toBeDefined();
        if (!stored)
            return;
        expect(stored.filename).toMatch(/^[0-9a-f]{12}\.png$/);
        expect(stored.original_filename).toBe('My_Cat.PNG');
        expect(stored.file_size).toBe(11);
        expect(await fsp.readFile(path.join(media.dir, stored.filename))).toEqual(buffer);
    });

    it('rejects a disallowed extension without writing anything', async () => {
        let stored = await media.store({ originalname: 'setup.exe', buffer: Buffer.from('MZ') });

        expect(stored).toBeUndefined();
        expect(await fsp.readdir(media.dir)).toEqual([]);
    });

    it('rejects a file without extension', async () => {
        expect(await media.store({ originalname: 'png', buffer: Buffer.from('x') })).toBeUndefined();
    });

    it('keeps at least the extension as display name', async () => {
        let stored = await media.store({ originalname: '日本.webm', buffer: Buffer.from('x') });

        expect(stored?.original_filename).toBe('webm');
    });

    it('only recognizes names it could have produced', () => {
        expect(media.isStoredName('0123456789ab.png')).toBe(true);
        expect(media.isStoredName('../secret.png')).toBe(false);
        expect(media.isStoredName('style.css')).toBe(false);
    });
});
