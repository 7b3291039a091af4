export * as Git from "./git";
export * as Workspace from "./workspace";
export * as Config from "./config_manager";
export * as ConfigStore from "./config_store";
export * as Logger from "./logger";
export * as Errors from "./errors";
export * as SessionLease from "./session_lease";
export * as ProtectedPaths from "./protected_paths";
export * as Prompter from "./prompter";

// Pipeline stages
export * as Backup from "./backup";
export * as Mirror from "./mirror";
export * as IntegrationMerge from "./integration_merge";
export * as ConflictResolver from "./conflict_resolver";
export * as TestGate from "./test_gate";
export * as Promoter from "./promoter";
export * as Notifier from "./notifier";
export * as Changelog from "./changelog";
export * as Sync from "./sync";

// Independent entry points
export * as Rollback from "./rollback";
export * as HealthCheck from "./health_check";
