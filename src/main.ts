import { makeApp } from './app';
import { initDb, openDatabase } from './database/connection';
import { seedBoards } from './database/boards';
import { MediaStore } from './media';
import { settings } from './settings';

(async () => {
    try {
        let db = await openDatabase(settings.dbfile);
        await initDb(db, settings.initdb);
        let seeded = await seedBoards(db);
        if (seeded)
            console.log(`No board found, created ${seeded} default boards`);

        let media = new MediaStore(settings.uploads);
        await media.init();

        let root = makeApp({ db, media, maxBody: settings.maxBody, secret: settings.secret, frontend: settings.frontend });
        root.listen(settings.port, () => {
            console.log(`Listening on ${settings.port}...`);
        });
    } catch (e) {
        console.error(e);
        process.exitCode = 1;
    }
})();
