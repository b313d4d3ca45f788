import type { PostStore } from "./posts/store.js";

declare module "./lib/api.js" {
	interface Locals {
		store: PostStore;
	}
}

export {};
