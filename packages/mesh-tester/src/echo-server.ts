import type { PebbleLayer } from 'istio-beacon';

export const ECHO_SERVER_CONTAINER = 'echo-server';
export const HTTP_PORT = 8080;
export const TCP_PORT = 8081;
export const ECHO_SERVER_PORTS = [HTTP_PORT, TCP_PORT];

/** One echo server service per port. */
export function echoServerLayer(ports: number[] = ECHO_SERVER_PORTS): PebbleLayer {
  const services: PebbleLayer['services'] = {};
  ports.forEach((port, i) => {
    services[`echo-server-${i}`] = {
      override: 'replace',
      command: '/bin/echo-server',
      startup: 'enabled',
      environment: { PORT: String(port) },
    };
  });
  return {
    summary: 'echo server layer',
    description: 'pebble config layer for echo server',
    services,
  };
}
