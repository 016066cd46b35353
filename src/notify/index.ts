export { FanoutDispatcher } from "./fanout-dispatcher.js";
export { LogChannel } from "./log-channel.js";
export type {
	AlertChannel,
	ChannelOutcome,
	DispatchOutcome,
	NotificationDispatcher,
} from "./types.js";
