import { describe, expect, it } from "vitest";
import { getChatTemplate } from "../../inference/server/src/completions/chat-template.js";

const messages = [
  { role: "system" as const, content: "Be brief." },
  { role: "user" as const, content: "Hi" },
];

describe("chat templates", () => {
  it("renders llama3 turns ending with an open assistant header", () => {
    const template = getChatTemplate("llama3");
    expect(template.render(messages)).toBe(
      "<|begin_of_text|>" +
        "<|start_header_id|>system<|end_header_id|>\n\nBe brief.<|eot_id|>" +
        "<|start_header_id|>user<|end_header_id|>\n\nHi<|eot_id|>" +
        "<|start_header_id|>assistant<|end_header_id|>\n\n"
    );
    expect(template.stop).toEqual(["<|eot_id|>"]);
  });

  it("renders chatml turns ending with an open assistant turn", () => {
    const template = getChatTemplate("chatml");
    expect(template.render(messages)).toBe(
      "<|im_start|>system\nBe brief.<|im_end|>\n" +
        "<|im_start|>user\nHi<|im_end|>\n" +
        "<|im_start|>assistant\n"
    );
    expect(template.stop).toEqual(["<|im_end|>"]);
  });

  it("keeps empty message content", () => {
    expect(getChatTemplate("chatml").render([{ role: "user", content: "" }])).toBe(
      "<|im_start|>user\n<|im_end|>\n<|im_start|>assistant\n"
    );
  });
});
