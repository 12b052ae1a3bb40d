export type ChatType = "private" | "group" | "supergroup" | "channel";

/**
 * A chat message carried by an inbound update.
 */
export type InboundMessage = {
	messageId: number;
	/** User ID of the sender; the chat ID when the update has no sender. */
	senderIdentity: number;
	/** Chat to reply into. */
	chatDestination: number;
	rawText: string;
	/** Unix timestamp in ms */
	receivedAt: number;
	chatType: ChatType;
	username?: string;
};

/**
 * One update from the long-poll stream. Updates that are not chat messages
 * still advance the watermark but carry no message.
 */
export type InboundEvent = {
	readonly sequenceId: number;
	readonly message?: Readonly<InboundMessage>;
};

export type FetchEventsOptions = {
	/** Server-side long-poll wait. */
	waitSeconds: number;
	/** Client-side timeout; must exceed waitSeconds. */
	timeoutMs: number;
};

/**
 * The messaging platform as seen by the relay.
 */
export interface ChatTransport {
	/** Events with sequenceId >= offset, in delivery order. */
	fetchEvents(offset: number, options: FetchEventsOptions): Promise<InboundEvent[]>;
	/** Send one message. Callers split long text first. */
	sendText(destination: number, text: string): Promise<void>;
}

/**
 * Bot info type
 */
export type BotInfo = {
	id: number;
	is_bot: boolean;
	first_name: string;
	username?: string;
};

export function formatBotInfo(botInfo: BotInfo): string {
	const parts = [`Bot: ${botInfo.first_name}`];
	if (botInfo.username) {
		parts.push(`(@${botInfo.username})`);
	}
	parts.push(`[ID: ${botInfo.id}]`);
	return parts.join(" ");
}
