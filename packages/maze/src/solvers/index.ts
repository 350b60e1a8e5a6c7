export * from "./bfs-solver";
