import { CULL_WORKGROUP_SIZE } from '@lumen2d/renderer-contract';

const CAMERA_STRUCT = `
struct Camera {
  viewProjection: mat4x4<f32>,
  viewSize: vec2<f32>,
  pointSizePx: f32,
  _pad0: f32,
}

@group(0) @binding(0) var<uniform> camera: Camera;

fn rotate2d(v: vec2<f32>, radians: f32) -> vec2<f32> {
  let c = cos(radians);
  let s = sin(radians);
  return vec2<f32>(v.x * c - v.y * s, v.x * s + v.y * c);
}
`;

/**
 * One invocation per batch record. Visible records take a slot from the
 * atomic instance count of the indirect args and copy themselves there.
 */
export const CULL_SHADER = `
struct CullUniforms {
  planes: array<vec4<f32>, 6>,
  instanceCount: u32,
  recordWords: u32,
  maxAreaExtent: f32,
  _pad0: u32,
}

struct DrawArgs {
  vertexCount: u32,
  instanceCount: atomic<u32>,
  firstVertex: u32,
  firstInstance: u32,
}

@group(0) @binding(0) var<uniform> cull: CullUniforms;
@group(0) @binding(1) var<storage, read> records: array<u32>;
@group(0) @binding(2) var<storage, read_write> compacted: array<u32>;
@group(0) @binding(3) var<storage, read_write> args: DrawArgs;

fn is_area(size: vec2<f32>) -> bool {
  return size.x > 0.0 && size.x < cull.maxAreaExtent && size.y > 0.0 && size.y < cull.maxAreaExtent;
}

@compute @workgroup_size(${CULL_WORKGROUP_SIZE})
fn cs_main(@builtin(global_invocation_id) id: vec3<u32>) {
  let index = id.x;
  if (index >= cull.instanceCount) {
    return;
  }

  let base = index * cull.recordWords;
  let center = vec2<f32>(bitcast<f32>(records[base]), bitcast<f32>(records[base + 1u]));
  let size = vec2<f32>(bitcast<f32>(records[base + 2u]), bitcast<f32>(records[base + 3u]));

  var halfExtent = vec2<f32>(0.0, 0.0);
  if (is_area(size)) {
    halfExtent = size * 0.5;
  }

  for (var i = 0u; i < 6u; i = i + 1u) {
    let plane = cull.planes[i];
    let signedDistance = dot(plane.xy, center) + plane.w;
    let reach = dot(abs(plane.xy), halfExtent);
    if (signedDistance + reach < 0.0) {
      return;
    }
  }

  let slot = atomicAdd(&args.instanceCount, 1u);
  let dst = slot * cull.recordWords;
  for (var word = 0u; word < cull.recordWords; word = word + 1u) {
    compacted[dst + word] = records[base + word];
  }
}
`;

/**
 * Shared by primitives and quads. Instances with a zero scale are points and
 * draw as a square of `pointSizePx` screen pixels.
 */
export const QUAD_SHADER = `${CAMERA_STRUCT}
struct QuadInput {
  @location(0) corner: vec2<f32>,
  @location(1) vertexColor: vec4<f32>,
  @location(2) translation: vec2<f32>,
  @location(3) scale: vec2<f32>,
  @location(4) color: vec4<f32>,
}

struct QuadOutput {
  @builtin(position) position: vec4<f32>,
  @location(0) color: vec4<f32>,
}

@vertex
fn vs_main(input: QuadInput) -> QuadOutput {
  let localPos = input.corner - vec2<f32>(0.5, 0.5);
  var clip: vec4<f32>;
  if (input.scale.x == 0.0 && input.scale.y == 0.0) {
    clip = camera.viewProjection * vec4<f32>(input.translation, 0.0, 1.0);
    let pixelToClip = vec2<f32>(2.0, -2.0) / camera.viewSize;
    clip = vec4<f32>(clip.xy + localPos * camera.pointSizePx * pixelToClip * clip.w, clip.zw);
  } else {
    let world = input.translation + localPos * input.scale;
    clip = camera.viewProjection * vec4<f32>(world, 0.0, 1.0);
  }

  var out: QuadOutput;
  out.position = clip;
  out.color = input.vertexColor * input.color;
  return out;
}

@fragment
fn fs_main(input: QuadOutput) -> @location(0) vec4<f32> {
  return input.color;
}
`;

export const SPRITE_SHADER = `${CAMERA_STRUCT}
@group(1) @binding(0) var atlasSampler: sampler;
@group(1) @binding(1) var atlasTexture: texture_2d<f32>;

struct SpriteInput {
  @location(0) corner: vec2<f32>,
  @location(1) cornerUv: vec2<f32>,
  @location(2) position: vec2<f32>,
  @location(3) color: vec4<f32>,
  @location(4) uvOffset: vec2<f32>,
  @location(5) uvScale: vec2<f32>,
  @location(6) size: vec2<f32>,
  @location(7) rotation: f32,
}

struct TexturedOutput {
  @builtin(position) position: vec4<f32>,
  @location(0) uv: vec2<f32>,
  @location(1) color: vec4<f32>,
}

@vertex
fn vs_main(input: SpriteInput) -> TexturedOutput {
  let localPos = (input.corner - vec2<f32>(0.5, 0.5)) * input.size;
  let world = input.position + rotate2d(localPos, input.rotation);

  var out: TexturedOutput;
  out.position = camera.viewProjection * vec4<f32>(world, 0.0, 1.0);
  out.uv = input.uvOffset + input.cornerUv * input.uvScale;
  out.color = input.color;
  return out;
}

@fragment
fn fs_main(input: TexturedOutput) -> @location(0) vec4<f32> {
  return textureSample(atlasTexture, atlasSampler, input.uv) * input.color;
}
`;

/**
 * Glyph quads are built at their offset from the run pivot, scaled, rotated
 * about the pivot, then moved to it. The pivot comes from the record tail;
 * the header holds the glyph's own cull box. The atlas alpha is coverage.
 */
export const GLYPH_SHADER = `${CAMERA_STRUCT}
@group(1) @binding(0) var atlasSampler: sampler;
@group(1) @binding(1) var atlasTexture: texture_2d<f32>;

struct GlyphInput {
  @location(0) corner: vec2<f32>,
  @location(1) cornerUv: vec2<f32>,
  @location(2) pivot: vec2<f32>,
  @location(3) color: vec4<f32>,
  @location(4) uvOffset: vec2<f32>,
  @location(5) uvScale: vec2<f32>,
  @location(6) pivotOffset: vec2<f32>,
  @location(7) size: vec2<f32>,
  @location(8) scale: vec2<f32>,
  @location(9) rotation: f32,
}

struct TexturedOutput {
  @builtin(position) position: vec4<f32>,
  @location(0) uv: vec2<f32>,
  @location(1) color: vec4<f32>,
}

@vertex
fn vs_main(input: GlyphInput) -> TexturedOutput {
  let localPos = (input.pivotOffset + input.corner * input.size) * input.scale;
  let world = input.pivot + rotate2d(localPos, input.rotation);

  var out: TexturedOutput;
  out.position = camera.viewProjection * vec4<f32>(world, 0.0, 1.0);
  out.uv = input.uvOffset + input.cornerUv * input.uvScale;
  out.color = input.color;
  return out;
}

@fragment
fn fs_main(input: TexturedOutput) -> @location(0) vec4<f32> {
  let coverage = textureSample(atlasTexture, atlasSampler, input.uv).a;
  return vec4<f32>(input.color.rgb, input.color.a * coverage);
}
`;

export const IMMEDIATE_SHADER = `${CAMERA_STRUCT}
struct ImmediateInput {
  @location(0) position: vec2<f32>,
  @location(1) color: vec4<f32>,
}

struct ImmediateOutput {
  @builtin(position) position: vec4<f32>,
  @location(0) color: vec4<f32>,
}

@vertex
fn vs_main(input: ImmediateInput) -> ImmediateOutput {
  var out: ImmediateOutput;
  out.position = camera.viewProjection * vec4<f32>(input.position, 0.0, 1.0);
  out.color = input.color;
  return out;
}

@fragment
fn fs_main(input: ImmediateOutput) -> @location(0) vec4<f32> {
  return input.color;
}
`;
