import net from "node:net"

// True when something on `host` accepts a TCP connection on `port`; a refused
// or timed-out connect means the port is free to bind
export async function isPortInUse(
  port: number,
  host = "127.0.0.1",
): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = new net.Socket()

    const onError = () => {
      socket.destroy()
      resolve(false)
    }

    const onConnect = () => {
      socket.destroy()
      resolve(true)
    }

    socket.setTimeout(1000)
    socket.once("error", onError)
    socket.once("timeout", onError)
    socket.connect(port, host, onConnect)
  })
}
