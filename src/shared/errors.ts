/** A rejected user action; its message is shown to the user as is. */
export class UserInputError extends Error {
	override readonly name = 'UserInputError'
}
