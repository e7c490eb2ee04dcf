export const SERVICES_TABLE = "services";
export const TRANSACTIONS_TABLE = "transactions";

export const DROP_SCHEMA_DDL = `
DROP TABLE IF EXISTS ${TRANSACTIONS_TABLE};
DROP TABLE IF EXISTS ${SERVICES_TABLE};
`;

export const CREATE_SCHEMA_DDL = `
CREATE TABLE ${SERVICES_TABLE} (
  id       INTEGER PRIMARY KEY,
  name     TEXT NOT NULL UNIQUE,
  project  TEXT
);

CREATE TABLE ${TRANSACTIONS_TABLE} (
  id           INTEGER PRIMARY KEY,
  number       INTEGER NOT NULL,
  method_name  TEXT NOT NULL,
  arguments    TEXT NOT NULL,
  returns      TEXT NOT NULL,
  service_id   INTEGER NOT NULL,
  FOREIGN KEY (service_id) REFERENCES ${SERVICES_TABLE}(id) ON DELETE CASCADE
);

CREATE INDEX idx_transactions_service ON ${TRANSACTIONS_TABLE}(service_id, number);
`;
