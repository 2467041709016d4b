// Socket ids per user; one user may have several tabs or devices connected
const userSockets = new Map<string, Set<string>>()

export function addUserSocket(userId: string, socketId: string) {
  const sockets = userSockets.get(userId) ?? new Set<string>()
  sockets.add(socketId)
  userSockets.set(userId, sockets)
}

export function removeUserSocket(userId: string, socketId: string) {
  const sockets = userSockets.get(userId)
  if (!sockets) return
  sockets.delete(socketId)
  if (sockets.size === 0) {
    userSockets.delete(userId)
  }
}

export function getUserSockets(userId: string): string[] {
  return [...(userSockets.get(userId) ?? [])]
}

export function clearUserSockets() {
  userSockets.clear()
}
