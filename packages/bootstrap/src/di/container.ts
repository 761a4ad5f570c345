/**
 * Dependency Injection container implementation using inversify.
 */

import "reflect-metadata";
import { Container as InversifyContainer } from "inversify";
import type { Token } from "./tokens.js";

/**
 * Factory function type for creating instances.
 */
export type Factory<T> = (container: Container) => T;

/**
 * Container interface for dependency injection.
 */
export interface Container {
	/**
	 * Register a dependency with singleton lifecycle.
	 * The factory runs on first resolution; later resolutions share the instance.
	 */
	singleton<T>(token: Token<T>, factory: Factory<T>): void;

	/**
	 * Register a pre-created value.
	 */
	instance<T>(token: Token<T>, value: T): void;

	/**
	 * Replace an existing registration with a pre-created value.
	 * Used to substitute collaborators such as the metadata client in tests.
	 */
	override<T>(token: Token<T>, value: T): void;

	/**
	 * Resolve a dependency by its token.
	 * @throws Error if the token is not registered.
	 */
	resolve<T>(token: Token<T>): T;

	has(token: Token<unknown>): boolean;
}

/**
 * Inversify-backed container.
 */
export class ContainerImpl implements Container {
	private readonly inversifyContainer = new InversifyContainer({ defaultScope: "Singleton" });

	singleton<T>(token: Token<T>, factory: Factory<T>): void {
		this.inversifyContainer
			.bind<T>(token)
			.toDynamicValue(() => factory(this))
			.inSingletonScope();
	}

	instance<T>(token: Token<T>, value: T): void {
		this.inversifyContainer.bind<T>(token).toConstantValue(value);
	}

	override<T>(token: Token<T>, value: T): void {
		if (this.has(token)) {
			this.inversifyContainer.unbindSync(token);
		}
		this.instance(token, value);
	}

	resolve<T>(token: Token<T>): T {
		if (!this.has(token)) {
			throw new Error(`No registration found for token: ${token.toString()}`);
		}
		return this.inversifyContainer.get<T>(token);
	}

	has(token: Token<unknown>): boolean {
		return this.inversifyContainer.isBound(token);
	}
}

export function createContainer(): Container {
	return new ContainerImpl();
}
