/**
 * The subset of the Messages database schema the source reads. Used to
 * build scratch databases for local runs and tests; the real file is only
 * ever opened read-only.
 */
export const CHAT_SCHEMA: string[] = [
  `create table if not exists handle (
    ROWID integer primary key autoincrement,
    id text not null,
    service text
  )`,
  `create table if not exists chat (
    ROWID integer primary key autoincrement,
    guid text unique not null,
    chat_identifier text,
    service_name text,
    display_name text
  )`,
  `create table if not exists message (
    ROWID integer primary key autoincrement,
    guid text unique not null,
    text text,
    attributedBody blob,
    handle_id integer default 0,
    service text,
    date integer,
    is_from_me integer default 0,
    cache_has_attachments integer default 0,
    associated_message_guid text,
    associated_message_type integer default 0,
    balloon_bundle_id text
  )`,
  `create table if not exists chat_message_join (
    chat_id integer references chat (ROWID) on delete cascade,
    message_id integer references message (ROWID) on delete cascade,
    primary key (chat_id, message_id)
  )`,
  `create table if not exists attachment (
    ROWID integer primary key autoincrement,
    guid text unique not null,
    filename text,
    mime_type text,
    total_bytes integer default 0,
    is_sticker integer default 0
  )`,
  `create table if not exists message_attachment_join (
    message_id integer references message (ROWID) on delete cascade,
    attachment_id integer references attachment (ROWID) on delete cascade,
    unique (message_id, attachment_id)
  )`
];
