export * from "./schemas/resources";
export * from "./schemas/worldState";
export * from "./schemas/weights";
export * from "./schemas/template";
export * from "./schemas/action";
export * from "./schemas/planner";
export * from "./schemas/schedule";
