import pkg from "../package.json";

export const VERSION: string = pkg.version;
export const TOOL_NAME = "n8n-backup";
