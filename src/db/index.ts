export { DatabaseManager } from "./database.js";
export { EventRepository, recordEvent } from "./repositories/event-repository.js";
