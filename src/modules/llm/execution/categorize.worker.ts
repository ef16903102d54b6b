import { completeWithOpenAi } from '../providers/openai-compatible.provider'
import { CompletionJobSchema, type WorkerReply } from '../schemas/categorization.schema'

async function readStdin(): Promise<string> {
	let data = ''
	process.stdin.setEncoding('utf8')
	for await (const chunk of process.stdin) data += chunk
	return data
}

export async function runWorker(
	input: string,
	complete: typeof completeWithOpenAi = completeWithOpenAi
): Promise<WorkerReply> {
	try {
		const job = CompletionJobSchema.parse(JSON.parse(input))
		const content = await complete(job)
		return { ok: true, content }
	} catch (e) {
		return { ok: false, error: e instanceof Error ? e.message : String(e) }
	}
}

if (require.main === module) {
	readStdin()
		.then(input => runWorker(input))
		.then(reply => {
			process.stdout.write(JSON.stringify(reply))
		})
		.catch((e: unknown) => {
			process.stdout.write(JSON.stringify({ ok: false, error: String(e) }))
			process.exitCode = 1
		})
}
