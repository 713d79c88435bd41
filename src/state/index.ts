export {
	createEventEmitter,
	type EventEmitterOptions,
	type EventMap,
	type Listener,
	type TypedEventEmitter,
} from "./event-emitter";

export {
	createStateMachine,
	type StateMachine,
	type StateMachineOptions,
	type TransitionCallback,
} from "./state-machine";
