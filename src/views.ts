import { Board, Post, Thread, ThreadPage, hasFile } from './database/schema';

const entities: { [k in string]: string } = {
    '&': '&amp;', '<': '&lt;', '>': '&gt;', '"': '&quot;', "'": '&#39;'
};

export let escape = (s: string) => s.replace(/[&<>"']/g, c => entities[c]);

let formatDate = (ms: number) =>
    new Date(ms).toISOString().replace('T', ' ').substring(0, 19) + ' UTC';

export let formatSize = (bytes: number) => {
    if (bytes < 1024)
        return `${bytes} B`;
    if (bytes < 1024 * 1024)
        return `${(bytes / 1024).toFixed(1)} KiB`;
    return `${(bytes / 1024 / 1024).toFixed(1)} MiB`;
};

// Texte brut -> HTML: échappé, les lignes >citées en vert
export let renderComment = (comment: string) =>
    comment
        .split('\n')
        .map(line => line.startsWith('>')
            ? `<span class="quote">${escape(line)}</span>`
            : escape(line))
        .join('<br>');

let layout = (title: string, body: string, flash?: string) => `<!DOCTYPE html>
<html>
<head>
<meta charset="utf-8">
<title>${escape(title)}</title>
<link rel="stylesheet" href="/style.css">
</head>
<body>
${flash ? `<div class="flash">${escape(flash)}</div>\n` : ''}${body}
</body>
</html>
`;

let media = (post: Post) => {
    if (!hasFile(post))
        return '';
    let url = `/uploads/${encodeURIComponent(post.filename)}`;
    let tag = /\.(webm|mp4)$/.test(post.filename)
        ? `<video src="${url}" controls></video>`
        : `<a href="${url}"><img src="${url}" alt="${escape(post.original_filename)}"></a>`;
    return `<div class="file">File: <a href="${url}">${escape(post.original_filename)}</a> (${formatSize(post.file_size)})</div>
${tag}`;
};

let renderPost = (post: Post) => {
    let name = post.email
        ? `<a href="mailto:${escape(post.email)}">${escape(post.name)}</a>`
        : escape(post.name);
    return `<div class="post${post.post_number == 1 ? ' op' : ''}" id="p${post.post_number}">
<div class="postinfo">${post.subject ? `<span class="subject">${escape(post.subject)}</span> ` : ''}<span class="name">${name}</span> <span class="date">${formatDate(post.created_at)}</span> <span class="number">No.${post.post_number}</span></div>
${media(post)}<blockquote>${renderComment(post.comment)}</blockquote>
</div>`;
};

let postForm = (board: Board, thread?: Thread) => `<form class="postform" action="/${escape(board.name)}/post" method="post" enctype="multipart/form-data">
${thread ? `<input type="hidden" name="thread_id" value="${thread.id}">\n` : ''}<input name="name" placeholder="Anonymous" maxlength="100">
<input name="email" placeholder="Email" maxlength="100">
<input name="subject" placeholder="Subject" maxlength="200">
<textarea name="comment" placeholder="Comment" maxlength="2000"></textarea>
<input type="file" name="file" accept=".png,.jpg,.jpeg,.gif,.webp,.webm,.mp4">
<button type="submit">${thread ? 'Reply' : 'New thread'}</button>
</form>`;

let threadFlags = (thread: Thread) =>
    (thread.is_pinned ? '<span class="pinned">[Pinned]</span> ' : '') +
    (thread.is_locked ? '<span class="locked">[Locked]</span> ' : '');

// Les cases non cochées ne sont pas envoyées: le champ caché "0" qui précède sert de valeur par défaut
let moderationForm = (thread: Thread) => `<form class="moderation" action="/admin/threads/${thread.id}" method="post">
<input type="hidden" name="pinned" value="0"><label><input type="checkbox" name="pinned" value="1"${thread.is_pinned ? ' checked' : ''}> Pinned</label>
<input type="hidden" name="locked" value="0"><label><input type="checkbox" name="locked" value="1"${thread.is_locked ? ' checked' : ''}> Locked</label>
<button type="submit">Update</button>
</form>`;

export let indexPage = (boards: Board[], flash?: string) => layout('Boards', `<h1>Boards</h1>
<ul class="boards">
${boards.map(b => `<li><a href="/${escape(b.name)}/">/${escape(b.name)}/ - ${escape(b.title)}</a> ${escape(b.description)}</li>`).join('\n')}
</ul>
<p><a href="/admin/create_board">Create a board</a></p>`, flash);

export let boardPage = (board: Board, page: ThreadPage, flash?: string) => {
    let threads = page.items.map(({ thread, preview, total }) => {
        let omitted = total - preview.length;
        return `<div class="thread" id="t${thread.id}">
<h2>${threadFlags(thread)}<a href="/${escape(board.name)}/thread/${thread.id}">${escape(thread.subject ?? 'No Subject')}</a></h2>
${preview.map(renderPost).join('\n')}
${omitted > 0 ? `<p class="omitted">${omitted} post${omitted == 1 ? '' : 's'} omitted.</p>\n` : ''}</div>`;
    });
    let nav = [
        page.page > 1 ? `<a href="?page=${page.page - 1}">Previous</a>` : '',
        `<span>Page ${page.page}</span>`,
        page.hasMore ? `<a href="?page=${page.page + 1}">Next</a>` : '',
    ].filter(s => s).join(' ');
    return layout(`/${board.name}/ - ${board.title}`, `<h1>/${escape(board.name)}/ - ${escape(board.title)}</h1>
<p class="description">${escape(board.description)}</p>
${postForm(board)}
${threads.join('\n<hr>\n')}
<div class="pages">${nav}</div>
<p><a href="/">Back to boards</a></p>`, flash);
};

export let threadPage = (board: Board, thread: Thread, posts: Post[], flash?: string) =>
    layout(`/${board.name}/ - ${thread.subject ?? 'No Subject'}`, `<h1>/${escape(board.name)}/ - ${escape(board.title)}</h1>
<h2>${threadFlags(thread)}${escape(thread.subject ?? 'No Subject')}</h2>
${posts.map(renderPost).join('\n')}
${thread.is_locked ? '<p class="locked">This thread is locked.</p>' : postForm(board, thread)}
${moderationForm(thread)}
<p><a href="/${escape(board.name)}/">Back to /${escape(board.name)}/</a></p>`, flash);

export let createBoardPage = (flash?: string) => layout('Create a board', `<h1>Create a board</h1>
<form action="/admin/create_board" method="post">
<input name="name" placeholder="Name (e.g. b)" maxlength="10" required>
<input name="title" placeholder="Title" maxlength="100" required>
<textarea name="description" placeholder="Description"></textarea>
<button type="submit">Create</button>
</form>
<p><a href="/">Back to boards</a></p>`, flash);

export let errorPage = (status: number, message: string) =>
    layout(`${status} ${message}`, `<h1>${status}</h1>
<p>${escape(message)}</p>
<p><a href="/">Back to boards</a></p>`);
