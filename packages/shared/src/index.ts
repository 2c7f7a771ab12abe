export * from "./types/uiElement.types";
export * from "./types/actionPlan.types";
export * from "./types/interaction.types";
export * from "./types/history.types";
export * from "./types/collaborators.types";
export * from "./types/runReport.types";

export * from "./errors/deskpilot.errors";
export * from "./config/env.schema";

export * from "./utils/coordinates.utils";
export * from "./utils/uiElement.utils";
export * from "./utils/actionPlan.utils";
export * from "./utils/history.utils";
export * from "./utils/keyDescriptor.utils";
export * from "./utils/async.utils";
export * from "./utils/platform.utils";
