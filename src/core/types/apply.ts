export interface ApplyCommandOptions {
  root?: string;
  block?: boolean;
  format?: string;
  color?: boolean;
}
