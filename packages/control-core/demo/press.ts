import { KeyDispatcher, RecordingKeySender } from "../src";

const sender = new RecordingKeySender();
const dispatcher = new KeyDispatcher(sender, { debug: true });

await dispatcher.handle("up", 0.5);
await dispatcher.handle("none", 0.52);
await dispatcher.handle("down", 0.6);

console.log("Keys pressed:", sender.pressed);
