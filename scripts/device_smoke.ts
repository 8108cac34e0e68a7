// scripts/device_smoke.ts
import fs from "node:fs";
import WebSocket from "ws";

const STREAM_URL = process.env.DEVICE_STREAM_URL ?? "ws://127.0.0.1:3000/v1/devices/stream";
const TOKEN = process.env.DEVICE_STREAM_TOKEN ?? "";
const DEVICE_ID = process.env.DEVICE_ID ?? "smoke-toy";
const FRAME_BYTES = 3200;

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

async function main() {
  const [audioPath, outPath = "reply.raw"] = process.argv.slice(2);
  if (!audioPath) {
    console.error("Usage: tsx scripts/device_smoke.ts <utterance.raw> [reply.raw]");
    process.exit(2);
  }

  const audio = fs.readFileSync(audioPath);
  const url = `${STREAM_URL}?device_id=${encodeURIComponent(DEVICE_ID)}&token=${encodeURIComponent(TOKEN)}`;
  const ws = new WebSocket(url);
  const reply: Buffer[] = [];

  await new Promise<void>((resolve, reject) => {
    ws.on("error", reject);
    ws.on("close", () => resolve());

    ws.on("open", () => {
      ws.send(JSON.stringify({ type: "listening_start", sample_rate: 16000, encoding: "LINEAR16" }));
    });

    ws.on("message", (data, isBinary) => {
      if (isBinary) {
        reply.push(toBuffer(data));
        return;
      }

      const text = toBuffer(data).toString("utf8");
      const message: { type?: string; status?: string } = JSON.parse(text);
      console.log("<-", text);

      if (message.type === "listening_start" && message.status === "ready") {
        for (let offset = 0; offset < audio.length; offset += FRAME_BYTES) {
          ws.send(audio.subarray(offset, offset + FRAME_BYTES));
        }
        ws.send(JSON.stringify({ type: "listening_end" }));
        return;
      }

      if (message.type === "speaking_end" || message.type === "error" || message.status === "error") {
        ws.close(1000, "done");
      }
    });
  });

  fs.writeFileSync(outPath, Buffer.concat(reply));
  console.log("reply bytes:", reply.reduce((total, chunk) => total + chunk.length, 0), "->", outPath);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
