export interface ParseCommandOptions {
  format?: string;
  color?: boolean;
}
