// CHANGE: Named service registry the startup gate polls
// WHY: Services that become available asynchronously (the engine module) announce themselves by name
// PURITY: SHELL (mutable, process-local)
// INVARIANT: whereis(n) = Some(s) after register(n, s) until unregister(n)
// COMPLEXITY: O(1) per operation

import { Option } from "effect";

export class ServiceRegistry<S> {
	private readonly services = new Map<string, S>();

	register(name: string, service: S): void {
		this.services.set(name, service);
	}

	unregister(name: string): void {
		this.services.delete(name);
	}

	whereis(name: string): Option.Option<S> {
		return Option.fromNullable(this.services.get(name));
	}
}
