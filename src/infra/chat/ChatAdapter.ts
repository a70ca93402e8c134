/**
 * Outbound side of the chat provider
 * Services talk to this interface; the Telegram implementation lives next to it
 */

/** A labeled button; `value` comes back verbatim as the selection payload */
export interface ChatOption {
  label: string;
  value: string;
}

/** Ordered rows of options, rendered top to bottom */
export type OptionRows = ChatOption[][];

/** Reference to a message the bot sent earlier */
export interface MessageRef {
  chatId: number;
  messageId: number;
}

/**
 * Every method resolves to whether the provider accepted the call.
 * Delivery failures are logged by the implementation and never thrown.
 */
export interface ChatAdapter {
  /** Send a new text message */
  sendText(chatId: number, text: string): Promise<boolean>;

  /** Send a new text message with selectable options */
  sendOptions(chatId: number, text: string, options: OptionRows): Promise<boolean>;

  /** Replace the text of an earlier message; options are removed unless given */
  editText(message: MessageRef, text: string, options?: OptionRows): Promise<boolean>;
}
