export { type ConnectionStringFields, ConnectionStringKey } from "./types.js";
export { formatConnectionString, parseConnectionString } from "./parser.js";
