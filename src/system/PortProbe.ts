import * as net from 'net'

export interface PortProbe {
  isListening(port: number, host?: string): Promise<boolean>
}

/**
 * Checks a port by opening a TCP connection to it
 */
export class TcpPortProbe implements PortProbe {
  constructor(private readonly timeoutMs: number = 2000) {}

  isListening(port: number, host: string = '127.0.0.1'): Promise<boolean> {
    return new Promise(resolve => {
      const socket = net.createConnection({ port, host })

      const finish = (listening: boolean) => {
        socket.destroy()
        resolve(listening)
      }

      socket.setTimeout(this.timeoutMs)
      socket.once('connect', () => finish(true))
      socket.once('timeout', () => finish(false))
      socket.once('error', () => finish(false))
    })
  }
}
