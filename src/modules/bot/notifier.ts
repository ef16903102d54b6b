/** Outbound messages to a user outside of an update, e.g. from cron jobs. */
export abstract class UserNotifier {
	/** Resolves false when the message could not be delivered. */
	abstract sendToUser(telegramId: string, text: string): Promise<boolean>
}
