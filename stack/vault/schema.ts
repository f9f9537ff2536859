const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    user_id INTEGER PRIMARY KEY,
    username TEXT,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  ) STRICT;

  CREATE TABLE IF NOT EXISTS auth_sessions (
    user_id INTEGER PRIMARY KEY REFERENCES users(user_id) ON DELETE CASCADE,
    login_enc BLOB,
    password_enc BLOB,
    cookies_enc BLOB,
    user_agent_enc BLOB,
    last_status TEXT CHECK (last_status IN (
      'success', 'invalid_credentials', 'captcha_failed', 'service_unavailable', 'unknown_error'
    )),
    last_status_at INTEGER,
    updated_at INTEGER NOT NULL
  ) STRICT;
`;

export { SCHEMA };
