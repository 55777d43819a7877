import { Logger } from 'effect'

export const silentLoggerLayer = Logger.replace(Logger.defaultLogger, Logger.make(() => {}))

/** Logger layer that keeps every message, for asserting on warnings. */
export const collectingLogger = () => {
  const messages: Array<string> = []
  const layer = Logger.replace(
    Logger.defaultLogger,
    Logger.make(({ message }) => {
      messages.push(String(message))
    }),
  )
  return { messages, layer }
}
