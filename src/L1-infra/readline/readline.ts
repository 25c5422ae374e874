import { createInterface } from 'node:readline/promises'

export interface PromptOptions {
  input?: NodeJS.ReadableStream
  output?: NodeJS.WritableStream
}

/** Print `message` and resolve once the user presses Enter. */
export async function waitForEnter(message: string, options?: PromptOptions): Promise<void> {
  const rl = createInterface({
    input: options?.input ?? process.stdin,
    output: options?.output ?? process.stdout,
    terminal: false,
  })
  try {
    await rl.question(message)
  } finally {
    rl.close()
  }
}
