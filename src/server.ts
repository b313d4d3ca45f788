import { create_app } from "./app.js";
import { load_config } from "./config.js";
import { log as _log } from "./lib/log.js";
import { load_seed } from "./posts/seed.js";
import { PostStore } from "./posts/store.js";

const log = _log.extend("server");

const config = load_config();
const store = new PostStore(config.SEED ? await load_seed() : []);
const app = create_app(store, { cors: config.CORS });

app.listen(config.PORT, config.HOST, () => {
	log("listening on http://%s:%d", config.HOST, config.PORT);
});
