import fs = require('fs');
import path = require('path');
import { v4 as uuidv4 } from 'uuid';

import { Attachment } from './database/schema';

let fsp = fs.promises;

export const allowedExtensions = ['png', 'jpg', 'jpeg', 'gif', 'webp', 'webm', 'mp4'];

export interface Upload {
    originalname: string;
    buffer: Buffer;
}

export let extensionOf = (filename: string) => {
    let dot = filename.lastIndexOf('.');
    if (dot < 0)
        return undefined;
    return filename.slice(dot + 1).toLowerCase();
};

// Nom affichable: ASCII seulement, sans séparateurs de chemin
export let secureFilename = (filename: string) =>
    filename
        .normalize('NFKD')
        .replace(/[^\x00-\x7f]/g, '')
        .replace(/[\/\\]/g, ' ')
        .split(/\s+/)
        .filter(s => s.length > 0)
        .join('_')
        .replace(/[^A-Za-z0-9_.-]/g, '')
        .replace(/^[._]+|[._]+$/g, '');

// 12 caractères hex, 48 bits d'aléa
export let storageName = (ext: string) =>
    `${uuidv4().replace(/-/g, '').substring(0, 12)}.${ext}`;

const storedNamePattern = /^[0-9a-f]{12}\.[a-z0-9]+$/;

export class MediaStore {
    constructor(readonly dir: string) { }

    init = () => fsp.mkdir(this.dir, { recursive: true });

    /**
     * Écrit le fichier dans le répertoire d'upload.
     * Renvoie undefined si l'extension n'est pas autorisée: le post continue sans fichier.
     */
    store = async (file: Upload): Promise<Attachment | undefined> => {
        let ext = extensionOf(file.originalname);
        if (ext === undefined || !allowedExtensions.includes(ext))
            return undefined;
        let filename = storageName(ext);
        let dest = path.join(this.dir, filename);
        // wx: une collision de nom échoue au lieu d'écraser
        await fsp.writeFile(dest, file.buffer, { flag: 'wx' });
        let { size } = await fsp.stat(dest);
        return {
            filename,
            original_filename: secureFilename(file.originalname),
            file_size: size,
        };
    };

    // Seuls les noms produits par storageName sont servis
    isStoredName = (filename: string) => storedNamePattern.test(filename);
}
