export type OutputFormat = "text" | "json";
