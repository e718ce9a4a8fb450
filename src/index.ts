export * from "./logger";
export * from "./errors";
export * from "./config";
export * from "./address";
export * from "./message";
export * from "./message_queue";
export * from "./transport";
export * from "./in_memory_network";
export * from "./task_set";
export * from "./node";
export * from "./gossip";
export * from "./gossip_protocol";
export * from "./trace";
export * from "./random";
export * from "./connectivity";
export * from "./layout";
export * from "./visualization";
export * from "./network_builder";
