import createDebug from "debug"

/*
Namespaced loggers. Silent unless enabled through DEBUG, eg:

	DEBUG=iu:* iu wait --timeout 500
*/
export const logger = {
	gate: createDebug("iu:gate"),
	scheduler: createDebug("iu:scheduler"),
	task: createDebug("iu:task"),
	limiter: createDebug("iu:limiter"),
	commands: createDebug("iu:commands"),
	cli: createDebug("iu:cli"),
}
