import type { Backend, HostProfile } from "./types.js";

export interface RuntimeStack {
  label: string;
  specs: string[];
  indexUrl: string;
}

const TORCH_SPECS = ["torch==2.6.0", "torchvision==0.21.0", "torchaudio==2.6.0"];
const TORCH_INDEX_URL = "https://download.pytorch.org/whl";

const RUNTIME_STACKS: Record<Backend, RuntimeStack> = {
  cpu: { label: "CPU-only PyTorch", specs: TORCH_SPECS, indexUrl: `${TORCH_INDEX_URL}/cpu` },
  rocm: { label: "ROCm PyTorch", specs: TORCH_SPECS, indexUrl: `${TORCH_INDEX_URL}/rocm6.2.4` },
  cuda: { label: "CUDA PyTorch", specs: TORCH_SPECS, indexUrl: `${TORCH_INDEX_URL}/cu124` },
};

const FLASH_ATTENTION_RELEASES_URL =
  "https://github.com/mjun0812/flash-attention-prebuild-wheels/releases/download";

export const MODEL_PACKAGE = "chatterbox-tts";

// huggingface_hub must land before transformers; omegaconf is used but not declared upstream.
export const DEPENDENCIES: readonly string[] = [
  "numpy>=1.24.0,<1.26.0",
  "librosa==0.11.0",
  "safetensors==0.5.3",
  "huggingface_hub>=0.23.2,<1.0",
  "transformers==4.46.3",
  "diffusers==0.29.0",
  "einops",
  "s3tokenizer",
  "conformer==0.3.2",
  "resemble-perth==1.0.1",
  "pykakasi==2.3.0",
  "gradio==5.44.1",
  "soundfile>=0.12.1",
  "audioread>=2.1.9",
  "omegaconf>=2.3.0",
  "pyloudnorm",
  "spacy-pkuseg",
];

/** Import names probed after installation. */
export const CRITICAL_MODULES: readonly string[] = [
  "torch",
  "torchaudio",
  "librosa",
  "safetensors",
  "transformers",
  "diffusers",
  "conformer",
  "s3tokenizer",
  "resemble_perth",
  "einops",
  "huggingface_hub",
  "soundfile",
  "audioread",
];

export function runtimeStackFor(backend: Backend): RuntimeStack {
  return RUNTIME_STACKS[backend];
}

/**
 * Prebuilt flash-attention wheel matching torch 2.6 / CUDA 12.4 and the interpreter tag.
 */
export function flashAttentionWheelUrl(host: HostProfile): string {
  const tag = host.runtimeTag;
  if (host.osFamily === "linux") {
    return `${FLASH_ATTENTION_RELEASES_URL}/v0.3.18/flash_attn-2.7.4+cu124torch2.6-${tag}-${tag}-linux_x86_64.whl`;
  }
  return `${FLASH_ATTENTION_RELEASES_URL}/v0.3.9/flash_attn-2.7.4+cu124torch2.6-${tag}-${tag}-win_amd64.whl`;
}
