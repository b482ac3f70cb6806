export type User = {
  id: string
  displayName: string
}

export type DisplayNameChange = {
  userId: string
  oldValue: string
  newValue: string
}

export type DisplayNameListener = (change: DisplayNameChange) => Promise<void>
