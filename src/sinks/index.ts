/**
 * Progress sink exports
 */

export { ConsoleSink, formatPercent } from "./console-sink";
export { ChannelSink } from "./channel-sink";
export { SilentSink } from "./silent-sink";
