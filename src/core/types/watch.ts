export interface WatchCommandOptions {
  root?: string;
  intervalMs?: number | string;
  once?: boolean;
  color?: boolean;
}
