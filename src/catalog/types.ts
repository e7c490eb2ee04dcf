/**
 * Catalog record types
 * A catalog is one services table plus one transactions table in one SQLite file.
 */

export interface Service {
  id: number;
  name: string;
  /** Backing interface (fully-qualified), null when enumeration could not resolve one */
  project: string | null;
}

export interface Transaction {
  id: number;
  number: number;
  methodName: string;
  /** Raw parameter signature, compared verbatim between catalogs */
  arguments: string;
  returns: string;
  serviceId: number;
}

export interface NewService {
  name: string;
  project: string | null;
}

export interface NewTransaction {
  number: number;
  methodName: string;
  arguments: string;
  returns: string;
  serviceId: number;
}

export interface ServiceRow {
  id: number;
  name: string;
  project: string | null;
}

export interface TransactionRow {
  id: number;
  number: number;
  method_name: string;
  arguments: string;
  returns: string;
  service_id: number;
}
