export type ClientCommand =
  | { type: 'subscribe'; conversationId?: string }
  | { type: 'ping' }
  | {
      type: 'submit_request'
      capability: string
      userId: string
      text: string
      requestId?: string
    }
  | {
      type: 'reply'
      conversationId: string
      userId: string
      text: string
      requestId?: string
    }
  | {
      type: 'close_conversation'
      conversationId: string
      reason?: string
      requestId?: string
    }
  | { type: 'get_conversation'; conversationId: string; requestId?: string }
