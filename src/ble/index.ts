export {
	connectWithRetry,
	DEFAULT_NOTIFICATION_TIMEOUT_MS,
	DEFAULT_WRITE_TIMEOUT_MS,
	type RetryOptions,
	type StartNotificationsOptions,
	type StopNotifications,
	startNotifications,
	type WriteOptions,
	withRetry,
	writeWithTimeout,
} from "./transport";
