// Protocol model

export {
  ConnectionModel,
  type ConnectionModelOptions,
  ConnectTask,
  OutboundPacket,
  InboundPacket,
} from "./connection.ts";
export { type AssembledPacket, UdpSession } from "./udp_session.ts";
export { MAX_FRAGMENTS, type Fragment, type FragmentPlan, planFragments, fragmentPayload } from "./fragments.ts";
export { TaskCounter, TaskRegistration } from "./task_counter.ts";
export {
  AssembleError,
  type AssembleErrorKind,
  FragmentError,
  type FragmentErrorKind,
} from "./errors.ts";
