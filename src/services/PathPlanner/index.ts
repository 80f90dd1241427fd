export * from "./PathPlanner";
export * from "./PathPlannerDefault";
