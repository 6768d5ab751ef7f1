import { keccak256, toBytes } from 'viem';
import { encodeFullState } from '../wire/codec';
import type { SceneState } from '../types/map';

/**
 * keccak256 of the canonical full-state encoding. Two scenes with the same
 * groups, theme and config share a fingerprint regardless of revision.
 */
export function sceneFingerprint(scene: Pick<SceneState, 'groups' | 'theme' | 'config'>): `0x${string}` {
  return keccak256(toBytes(JSON.stringify(encodeFullState(scene))));
}
