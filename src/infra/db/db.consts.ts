export const REQUIRED_TABLE_STATEMENTS = [
  `
    create table if not exists operator_identity (
      slot text primary key,
      chat_id text not null,
      username text,
      paired_at text not null,
      updated_at text not null
    )
  `,
] as const;

export const OPERATOR_SLOT = "default";
