export interface Board {
    id: number;
    name: string;
    title: string;
    description: string;
}

// SQLite n'a pas de booléens, les drapeaux reviennent en 0/1
export type ThreadRow = {
    id: number;
    board_id: number;
    subject: string | null;
    created_at: number;
    bumped_at: number;
    is_pinned: number;
    is_locked: number;
};

export type Thread = Omit<ThreadRow, 'is_pinned' | 'is_locked'> & {
    is_pinned: boolean;
    is_locked: boolean;
};

export type BasePost = {
    id: number;
    thread_id: number;
    post_number: number;
    name: string;
    email: string;
    subject: string;
    comment: string;
    created_at: number;
    // réservés, jamais remplis
    image_width: number | null;
    image_height: number | null;
    thumbnail: string | null;
};

export type PostWithoutFile = BasePost & {
    filename: null;
    original_filename: null;
    file_size: null;
};

export type PostWithFile = BasePost & {
    filename: string;
    original_filename: string;
    file_size: number;
};

export type Post = PostWithFile | PostWithoutFile;

export type Attachment = Pick<PostWithFile, 'filename' | 'original_filename' | 'file_size'>;

// Ce que l'utilisateur soumet, une fois nettoyé
export type PostFields = Pick<BasePost, 'name' | 'email' | 'subject' | 'comment'> & {
    file?: Attachment;
};

export type ThreadSummary = {
    thread: Thread;
    preview: Post[];
    total: number;
};

export type ThreadPage = {
    items: ThreadSummary[];
    page: number;
    hasMore: boolean;
};

export let toThread = (row: ThreadRow): Thread => ({
    ...row,
    is_pinned: row.is_pinned != 0,
    is_locked: row.is_locked != 0,
});

export let hasFile = (post: Post): post is PostWithFile =>
    post.filename !== null;
