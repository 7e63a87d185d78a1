export * from "./types";
export * from "./game/constants";
export * from "./game/coordinate";
export * from "./game/piece";
export * from "./game/board";
export * from "./game/validator";
export * from "./game/render";
export * from "./game/controller";
