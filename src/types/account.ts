/**
 * Account and session type definitions.
 */

export type AccountType = "CFD" | "PHYSICAL" | "SPREADBET";
export type AccountStatus = "DISABLED" | "ENABLED" | "SUSPENDED_FROM_DEALING";

/** Cash position of a dealing account */
export interface AccountBalance {
  balance: number;
  deposit: number;
  profitLoss: number;
  available: number;
}

export interface Account {
  accountId: string;
  accountName: string;
  accountAlias: string | null;
  accountType: AccountType;
  status: AccountStatus;
  preferred: boolean;
  currency: string;
  balance: AccountBalance;
  canTransferFrom: boolean;
  canTransferTo: boolean;
}

/** GET /session */
export interface SessionDetails {
  clientId: string;
  accountId: string;
  timezoneOffset: number;
  locale: string;
  currency: string;
  lightstreamerEndpoint: string;
}
