export const WORKFLOW_MODULE_OPTIONS = 'WORKFLOW_MODULE_OPTIONS';
export const WORKFLOW_DB_ADAPTER = 'WORKFLOW_DB_ADAPTER';
export const WORKFLOW_ENGINE = 'WORKFLOW_ENGINE';
export const WORKFLOW_CLOCK = 'WORKFLOW_CLOCK';
export const WORKFLOW_GRAPH_RULES = 'WORKFLOW_GRAPH_RULES';
export const TRANSITION_GUARD_METADATA = 'workflow:transition-guard';
