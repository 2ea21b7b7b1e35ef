import { TypedEventEmitter, type Logger } from "@libp2p/interface"
import { logger } from "@libp2p/logger"
import { pushable, type Pushable } from "it-pushable"

import type { Dao } from "./Dao.js"
import type { Entity } from "./Entity.js"
import { NotifierDisposedError } from "./errors.js"
import { Repository } from "./Repository.js"
import type { Awaitable, PrimaryKeyValue } from "./types.js"

export type NotifierEvents<T> = {
	change: CustomEvent<T[]>
}

/**
 * Keeps subscribers in sync with a table. Every mutation is followed by a
 * full re-read of the table, and the fresh list is published to everyone
 * subscribed at that moment. Snapshots are not replayed to late subscribers;
 * call `get()` to force a publish.
 *
 * Refreshes are not atomic with the mutation that triggered them, so a
 * concurrent caller may observe an intermediate snapshot.
 */
export class Notifier<T extends Entity<T>> extends TypedEventEmitter<NotifierEvents<T>> {
	protected readonly log: Logger
	protected readonly repository: Repository<T>

	readonly #sources = new Set<Pushable<T[]>>()
	readonly #subscriptions = new Set<() => void>()
	#disposed = false

	constructor(dao: Dao<T>) {
		super()
		this.repository = new Repository(dao)
		this.log = logger(`tablemap:orm:notifier:${dao.table}`)
	}

	public get disposed(): boolean {
		return this.#disposed
	}

	/** Re-read the whole table and publish it. */
	public async get(): Promise<T[]> {
		this.#assertOpen()
		const results = await this.repository.get()
		this.#publish(results)
		return results
	}

	public async create(obj: T): Promise<number> {
		this.#assertOpen()
		const id = await this.repository.create(obj)
		await this.get()
		return id
	}

	public async update(obj: T): Promise<number> {
		this.#assertOpen()
		const count = await this.repository.update(obj)
		await this.get()
		return count
	}

	public async delete(target: T | PrimaryKeyValue): Promise<number> {
		this.#assertOpen()
		const count = await this.repository.delete(target)
		await this.get()
		return count
	}

	public async deleteAll(): Promise<number> {
		this.#assertOpen()
		const count = await this.repository.deleteAll()
		await this.get()
		return count
	}

	/**
	 * Call `callback` with every snapshot published from now on.
	 * Errors thrown by the callback are logged and otherwise ignored.
	 * Returns a function that removes the subscription.
	 */
	public subscribe(callback: (results: T[]) => Awaitable<void>): () => void {
		this.#assertOpen()
		const listener = (event: CustomEvent<T[]>) => this.#notify(callback, event.detail)
		const unsubscribe = () => {
			this.removeEventListener("change", listener)
			this.#subscriptions.delete(unsubscribe)
		}

		this.addEventListener("change", listener)
		this.#subscriptions.add(unsubscribe)
		return unsubscribe
	}

	/** Iterate over every snapshot published from now on, until the notifier is disposed. */
	public values(): AsyncIterable<T[]> {
		this.#assertOpen()
		const source = pushable<T[]>({
			objectMode: true,
			onEnd: () => this.#sources.delete(source),
		})

		this.#sources.add(source)
		return source
	}

	/** Close the channel. Calling any other method afterwards throws. */
	public dispose() {
		if (this.#disposed) {
			return
		}

		this.log("disposing")
		this.#disposed = true
		for (const source of this.#sources) {
			source.end()
		}

		this.#sources.clear()

		for (const unsubscribe of this.#subscriptions) {
			unsubscribe()
		}
	}

	#publish(results: T[]) {
		this.log.trace("publishing %d results", results.length)
		this.safeDispatchEvent("change", { detail: results })
		for (const source of this.#sources) {
			source.push(results)
		}
	}

	#notify(callback: (results: T[]) => Awaitable<void>, results: T[]) {
		try {
			const result = callback(results)
			if (result instanceof Promise) {
				result.catch((err) => this.log.error("subscriber failed: %O", err))
			}
		} catch (err) {
			this.log.error("subscriber failed: %O", err)
		}
	}

	#assertOpen() {
		if (this.#disposed) {
			throw new NotifierDisposedError(this.repository.table)
		}
	}
}
