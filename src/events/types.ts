import type { MessageType } from "../bus/messages.js"
import type {
    EscalationReason,
    EscalationResolution,
    FailureKind,
    PipelineProgress,
    TaskState,
    ValidationVerdict,
} from "../types.js"

export type ConclaveEvent =
    | {
          type: "message:published"
          messageId: string
          messageType: MessageType
          senderId: string
          recipient: string
          taskId: string
      }
    | {
          type: "message:dead_letter"
          messageId: string
          messageType: MessageType
          subscriberId: string
          error: string
      }
    | {
          type: "task:created"
          taskId: string
          componentId: string
      }
    | {
          type: "task:state_change"
          taskId: string
          from: TaskState
          to: TaskState
          retryCount: number
          previousOwner: string | null
          owner: string | null
          previousValidator: string | null
          validator: string | null
      }
    | {
          type: "task:progress"
          taskId: string
          agentId: string
          progress?: number
          detail?: string
      }
    | {
          type: "task:stale_message"
          taskId: string
          messageId: string
          messageType: MessageType
          reason: string
      }
    | {
          type: "task:expired"
          taskId: string
          state: TaskState
          kind: FailureKind
      }
    | {
          type: "agent:error"
          taskId: string
          agentId: string
          phase: "production" | "validation"
          message: string
      }
    | {
          type: "validation:attempt"
          taskId: string
          episode: number
          attemptNumber: number
          validatorId: string
          result: ValidationVerdict
          feedback: string
      }
    | {
          type: "escalation:opened"
          escalationId: string
          taskId: string
          reason: EscalationReason
          rejectionCount: number
      }
    | {
          type: "escalation:resolved"
          escalationId: string
          taskId: string
          resolution: EscalationResolution
          note: string | null
      }
    | {
          type: "pipeline:progress"
          progress: PipelineProgress
      }
