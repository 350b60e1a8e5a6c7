export * from "./fast-queue";
