/**
 * Identity of one development project/branch
 */
export interface Context {
  /** 12 hex characters */
  hash: string;
  path: string;
  label: string;
  remote?: string;
  branch?: string;
}
