export { Conclave } from "./Conclave.js"
export type { ConclaveOptions, RunOptions, RunResult } from "./Conclave.js"
export { Orchestrator, ORCHESTRATOR_ID } from "./orchestrator/Orchestrator.js"
export type { OrchestratorOptions } from "./orchestrator/Orchestrator.js"
export { HumanApprovalChannel } from "./orchestrator/HumanApprovalChannel.js"
export type {
    ApprovalDecider,
    ApprovalRequest,
    HumanDecision,
} from "./orchestrator/HumanApprovalChannel.js"

export { InMemoryMessageBus } from "./bus/InMemoryMessageBus.js"
export type { DeadLetter, InMemoryMessageBusOptions } from "./bus/InMemoryMessageBus.js"
export { forRecipient } from "./bus/MessageBus.js"
export type { MessageBus, MessageHandler, MessagePredicate, Subscription } from "./bus/MessageBus.js"
export { publishWithRetry, request } from "./bus/delivery.js"
export {
    MessageSchema,
    PIPELINE_TASK_ID,
    createMessage,
    isMessageOf,
} from "./bus/messages.js"
export type { A2AMessage, MessageOf, MessageRoute, MessageType, PayloadOf } from "./bus/messages.js"

export { TaskRegistry } from "./registry/TaskRegistry.js"
export { canTransition, isTerminal } from "./registry/stateMachine.js"
export { EscalationManager } from "./workflow/EscalationManager.js"
export { FollowUps } from "./workflow/FollowUps.js"
export { ValidationLoopController } from "./workflow/ValidationLoopController.js"
export {
    analyzeRejectionPattern,
    classifyRejections,
    normalizeFeedback,
} from "./workflow/rejectionAnalysis.js"

export { CapabilityRegistry } from "./agents/CapabilityRegistry.js"
export { AgentRuntime } from "./agents/AgentRuntime.js"
export { ProducerAgent, ValidatorAgent } from "./agents/adapters.js"
export type { ArtifactProducer, ValidatorJudgment } from "./agents/adapters.js"
export type {
    AgentProxy,
    AssignmentContext,
    Result,
    TaskAssignment,
    ValidationRequest,
    WorkerRole,
} from "./agents/AgentProxy.js"

export { EventBus } from "./events/EventBus.js"
export type { ConclaveEvent } from "./events/types.js"
export { FileStore } from "./persistence/FileStore.js"
export { resolveConfig, loadRcConfig } from "./core/Config.js"
export type { ConclaveConfig, ConclaveConfigInput } from "./core/Config.js"
export * from "./core/errors.js"

export { loadScenario, parseScenario } from "./scenario/Scenario.js"
export type { Scenario, ScenarioInput } from "./scenario/Scenario.js"
export { runScenario } from "./scenario/runScenario.js"

export type {
    AgentRole,
    Artifact,
    Escalation,
    EscalationReason,
    EscalationResolution,
    FailureKind,
    PipelineProgress,
    Task,
    TaskDefinition,
    TaskFailure,
    TaskState,
    ValidationAttempt,
    ValidationOutcome,
} from "./types.js"
