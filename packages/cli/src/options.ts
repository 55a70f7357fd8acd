/** Options registered on the root program and shared by every command. */
export interface GlobalOptions {
  json?: boolean;
  config?: string;
  verbose?: boolean;
}
