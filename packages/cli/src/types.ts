/**
 * KMEN Import CLI - Core Types
 */

export interface WorkspaceOptions {
    workspace?: string;
}

export interface ImportOptions extends WorkspaceOptions {
    dryRun?: boolean;
    /** false when --no-rules is given */
    rules?: boolean;
    user?: string;
}

export interface ApplyRulesCommandOptions extends WorkspaceOptions {
    all?: boolean;
    batch?: string;
    dryRun?: boolean;
}

export interface ExportOptions extends WorkspaceOptions {
    from?: string;
    to?: string;
    status?: string;
    uncategorized?: boolean;
}

export interface StatsOptions extends WorkspaceOptions {
    from?: string;
    to?: string;
    byMonth?: boolean;
    byTribe?: boolean;
    byCostType?: boolean;
}

export interface AddRuleOptions extends WorkspaceOptions {
    mode?: string;
    priority?: string;
    caseSensitive?: boolean;
    direction?: string;
    costType?: string;
    costDetail?: string;
    tribe?: string;
}

export interface WorkspaceConfig {
    rulesPath: string;
}

export interface Workspace {
    root: string;
    data: string;
    outputs: string;
    storePath: string;
    config: WorkspaceConfig;
}
