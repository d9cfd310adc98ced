/**
 * Decoder factories keyed on wheel type.
 */

import { WheelType } from '../models/enums';
import type { WheelDecoder } from './decoder';
import { AutoDetectDecoder } from './decoders/auto-detect';
import { GotwayDecoder } from './decoders/gotway';
import { InmotionDecoder } from './decoders/inmotion';
import { InmotionV2Decoder } from './decoders/inmotion-v2';
import { KingsongDecoder } from './decoders/kingsong';
import { NinebotDecoder, NinebotProtocol } from './decoders/ninebot';
import { NinebotZDecoder } from './decoders/ninebot-z';
import { VeteranDecoder } from './decoders/veteran';

export interface WheelDecoderFactory {
  /** New decoder for the type, or null when none exists. */
  createDecoder(wheelType: WheelType): WheelDecoder | null;
  supportedTypes(): WheelType[];
}

export interface DecoderFactoryOptions {
  /** Ninebot legacy wheels share a wheel type but differ in addressing. */
  ninebotProtocol?: NinebotProtocol;
}

const SUPPORTED_TYPES: readonly WheelType[] = [
  WheelType.KINGSONG,
  WheelType.GOTWAY,
  WheelType.GOTWAY_VIRTUAL,
  WheelType.VETERAN,
  WheelType.NINEBOT,
  WheelType.NINEBOT_Z,
  WheelType.INMOTION,
  WheelType.INMOTION_V2,
];

export class DefaultWheelDecoderFactory implements WheelDecoderFactory {
  private readonly ninebotProtocol: NinebotProtocol;

  constructor(options: DecoderFactoryOptions = {}) {
    this.ninebotProtocol = options.ninebotProtocol ?? NinebotProtocol.DEFAULT;
  }

  createDecoder(wheelType: WheelType): WheelDecoder | null {
    switch (wheelType) {
      case WheelType.KINGSONG:
        return new KingsongDecoder();
      case WheelType.GOTWAY:
        return new GotwayDecoder();
      case WheelType.GOTWAY_VIRTUAL:
        return new AutoDetectDecoder();
      case WheelType.VETERAN:
        return new VeteranDecoder();
      case WheelType.NINEBOT:
        return new NinebotDecoder(this.ninebotProtocol);
      case WheelType.NINEBOT_Z:
        return new NinebotZDecoder();
      case WheelType.INMOTION:
        return new InmotionDecoder();
      case WheelType.INMOTION_V2:
        return new InmotionV2Decoder();
      default:
        return null;
    }
  }

  supportedTypes(): WheelType[] {
    return [...SUPPORTED_TYPES];
  }
}

/**
 * Hands out one decoder per wheel type, created on first request.
 */
export class CachingWheelDecoderFactory implements WheelDecoderFactory {
  private readonly cache = new Map<WheelType, WheelDecoder>();

  constructor(private readonly delegate: WheelDecoderFactory = new DefaultWheelDecoderFactory()) {}

  createDecoder(wheelType: WheelType): WheelDecoder | null {
    const cached = this.cache.get(wheelType);
    if (cached) return cached;
    const decoder = this.delegate.createDecoder(wheelType);
    if (decoder) {
      this.cache.set(wheelType, decoder);
    }
    return decoder;
  }

  supportedTypes(): WheelType[] {
    return this.delegate.supportedTypes();
  }

  /** Cached decoder without creating one. */
  getDecoderOrNull(wheelType: WheelType): WheelDecoder | null {
    return this.cache.get(wheelType) ?? null;
  }

  /** Reset and forget every cached decoder. */
  clearCache(): void {
    for (const decoder of this.cache.values()) {
      decoder.reset();
    }
    this.cache.clear();
  }
}
