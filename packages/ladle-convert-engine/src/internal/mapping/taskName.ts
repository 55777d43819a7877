const capitalize = (s: string): string => `${s.slice(0, 1).toUpperCase()}${s.slice(1)}`

/** `Enable and start service nginx`; a declaration that only waits for notifications reads `Declare service nginx`. */
export const taskName = (args: {
  readonly type: string
  readonly name: string
  readonly actions: ReadonlyArray<string>
}): string => {
  const verbs = args.actions.filter((a) => a !== 'nothing').map((a) => a.replace(/_/g, ' '))
  const lead = verbs.length > 0 ? capitalize(verbs.join(' and ')) : 'Declare'
  return `${lead} ${args.type} ${args.name}`
}
