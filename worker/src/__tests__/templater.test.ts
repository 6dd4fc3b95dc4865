import { MAX_SEED } from "@genrelay/shared";
import { buildWorkflowRequest, randomSeed, type WorkflowValues } from "../pipeline/templater";
import type { WorkflowBindings, WorkflowGraph } from "../pipeline/workflow";

const template: WorkflowGraph = {
  "6": { class_type: "CLIPTextEncode", inputs: { text: "default positive", clip: ["38", 0] } },
  "7": { class_type: "CLIPTextEncode", inputs: { text: "default negative", clip: ["38", 0] } },
  "72": { class_type: "SamplerCustom", inputs: { noise_seed: 0, cfg: 3 } },
  "240": { class_type: "VHS_LoadImagePath", inputs: { image: "" } },
  "241": { class_type: "VHS_VideoCombine", inputs: { filename_prefix: "unassigned", frame_rate: 24 } },
};

const bindings: WorkflowBindings = {
  imageInput: { nodeId: "240", input: "image" },
  positivePrompt: { nodeId: "6", input: "text" },
  negativePrompt: { nodeId: "7", input: "text" },
  seed: { nodeId: "72", input: "noise_seed" },
  outputPrefix: { nodeId: "241", input: "filename_prefix" },
};

const values: WorkflowValues = {
  jobId: "job_abc",
  imagePath: "/data/input/input_job_abc_1.png",
  prompt: "a cat",
  negativePrompt: "blurry",
  seed: 1234,
};

const options = { outputSubfolder: "relay_output" };

describe("buildWorkflowRequest", () => {
  it("sets every bound field", () => {
    const { graph, seed, warnings } = buildWorkflowRequest(template, bindings, values, options);

    expect(seed).toBe(1234);
    expect(warnings).toEqual([]);
    expect(graph["240"].inputs.image).toBe("/data/input/input_job_abc_1.png");
    expect(graph["6"].inputs).toEqual({ text: "a cat", clip: ["38", 0] });
    expect(graph["7"].inputs.text).toBe("blurry");
    expect(graph["72"].inputs).toEqual({ noise_seed: 1234, cfg: 3 });
    expect(graph["241"].inputs.filename_prefix).toBe("relay_output/job_abc");
  });

  it("never touches the template and is repeatable", () => {
    const before = JSON.stringify(template);
    const a = buildWorkflowRequest(template, bindings, values, options);
    const b = buildWorkflowRequest(template, bindings, values, options);

    expect(JSON.stringify(template)).toBe(before);
    expect(JSON.stringify(a.graph)).toBe(JSON.stringify(b.graph));
    expect(a.graph).not.toBe(template);
    expect(a.graph["6"].inputs.clip).not.toBe(template["6"].inputs.clip);
  });

  it("leaves the template's prompts when none are supplied", () => {
    const { graph } = buildWorkflowRequest(
      template,
      bindings,
      { ...values, prompt: "", negativePrompt: null },
      options
    );
    expect(graph["6"].inputs.text).toBe("default positive");
    expect(graph["7"].inputs.text).toBe("default negative");
  });

  it("injects an empty negative prompt when one is supplied", () => {
    const { graph } = buildWorkflowRequest(template, bindings, { ...values, negativePrompt: "" }, options);
    expect(graph["7"].inputs.text).toBe("");
  });

  it("generates a seed only when the job has none", () => {
    const source = jest.fn(() => 777);

    const generated = buildWorkflowRequest(template, bindings, { ...values, seed: null }, { ...options, randomSeed: source });
    expect(generated.seed).toBe(777);
    expect(generated.graph["72"].inputs.noise_seed).toBe(777);

    const zero = buildWorkflowRequest(template, bindings, { ...values, seed: 0 }, { ...options, randomSeed: source });
    expect(zero.seed).toBe(0);
    expect(source).toHaveBeenCalledTimes(1);
  });

  it("skips unbound fields and missing nodes with warnings", () => {
    const partial: WorkflowBindings = {
      imageInput: { nodeId: "240", input: "image" },
      seed: { nodeId: "99", input: "seed" },
      outputPrefix: { nodeId: "241", input: "filename_prefix" },
    };
    const { graph, warnings } = buildWorkflowRequest(template, partial, values, options);

    expect(warnings).toEqual([
      "positivePrompt: no binding in this workflow, value skipped",
      "negativePrompt: no binding in this workflow, value skipped",
      "seed: node 99 not in workflow, value skipped",
    ]);
    expect(graph["99"]).toBeUndefined();
    expect(graph["6"].inputs.text).toBe("default positive");
    expect(graph["241"].inputs.filename_prefix).toBe("relay_output/job_abc");
  });
});

describe("randomSeed", () => {
  it("draws integers from 1 to MAX_SEED", () => {
    for (let i = 0; i < 500; i++) {
      const seed = randomSeed();
      expect(Number.isSafeInteger(seed)).toBe(true);
      expect(seed).toBeGreaterThanOrEqual(1);
      expect(seed).toBeLessThanOrEqual(MAX_SEED);
    }
  });

  it("keeps the top 53 bits and redraws a zero", () => {
    const draws = [Buffer.alloc(8, 0x00), Buffer.alloc(8, 0xff)];
    const bytes = jest.fn((size: number) => draws.shift() ?? Buffer.alloc(size, 0x01));

    expect(randomSeed(bytes)).toBe(MAX_SEED);
    expect(bytes).toHaveBeenCalledTimes(2);
    expect(bytes).toHaveBeenCalledWith(8);
  });

  it("maps the lowest non-zero draw to 1", () => {
    const draw = Buffer.alloc(8, 0x00);
    draw.writeUInt16BE(0x0800, 6);
    expect(randomSeed(() => draw)).toBe(1);
  });
});
