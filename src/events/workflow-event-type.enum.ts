export enum WorkflowEventType {
  DEFINITION_REGISTERED = 'workflow.definition.registered',
  DEFINITION_DEACTIVATED = 'workflow.definition.deactivated',
  INSTANCE_CREATED = 'workflow.instance.created',
  TRANSITION = 'workflow.transition',
}
