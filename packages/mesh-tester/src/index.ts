export { ServiceMeshTesterCharm, TESTER_NAME } from './charm';
export type { ServiceMeshTesterOptions } from './charm';
export { ECHO_SERVER_CONTAINER, ECHO_SERVER_PORTS, echoServerLayer, HTTP_PORT, TCP_PORT } from './echo-server';
