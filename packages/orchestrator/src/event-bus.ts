import { EventEmitter } from "node:events";
import type { BuildState, PlatformTarget } from "@serbench/core";
import type { BatchResult, CodegenResult, CompiledSchema } from "@serbench/generator-core";
import type { BuildReport } from "./orchestrator";

export interface EventDataMap {
	"build.state": { from: BuildState; to: BuildState };
	"tool.resolved": { platform: PlatformTarget; toolPath: string };
	"schema.compiled": CompiledSchema;
	"batch.completed": BatchResult;
	"codegen.completed": CodegenResult;
	"build.completed": BuildReport;
	"build.failed": { state: BuildState; error: unknown };
}

export type EventType = keyof EventDataMap;

export interface BusEvent<K extends EventType = EventType> {
	type: K;
	data: EventDataMap[K];
	timestamp: string;
}

/** Typed publish/subscribe channel for build progress. */
export class EventBus {
	private readonly emitter = new EventEmitter();

	emit<K extends EventType>(type: K, data: EventDataMap[K]): boolean {
		const event: BusEvent<K> = { type, data, timestamp: new Date().toISOString() };
		return this.emitter.emit(type, event);
	}

	/** Subscribe to one event type. */
	on<K extends EventType>(type: K, handler: (event: BusEvent<K>) => void): void {
		this.emitter.on(type, handler);
	}

	off<K extends EventType>(type: K, handler: (event: BusEvent<K>) => void): void {
		this.emitter.off(type, handler);
	}
}
