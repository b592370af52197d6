import { asClass, asFunction, type AwilixContainer } from "awilix";
import type { Cradle } from "../infra/di";
import { Chunker } from "./_internal/Chunker";
import { CursorCodec } from "./_internal/CursorCodec";
import { KeyAccessor } from "./_internal/KeyAccessor";
import { ProgressiveDeliveryService } from "./_internal/ProgressiveDeliveryService";
import { ResponseAssembler } from "./_internal/ResponseAssembler";

// Public API
export * from "./api";
export * from "./errors";
export { CursorCodec } from "./_internal/CursorCodec";
export { Part, type Producer } from "./_internal/Part";
export { PartRegistry } from "./_internal/PartRegistry";
export { defineEndpoint } from "./_internal/ProgressiveDeliveryService";
export {
  createProgressiveRouter,
  handleProgressiveError,
} from "./_internal/ProgressiveController";

// Registration Function (Services)
export const registerStreamDomain = (container: AwilixContainer<Cradle>) => {
  container.register({
    cursorCodec: asFunction(
      ({ settings, clock }: Cradle) =>
        new CursorCodec({
          secret: settings.cursorSecret,
          ttlSeconds: settings.cursorTtl,
          maxTokenLength: settings.maxCursorSize,
          now: clock,
        }),
    ).singleton(),
    chunker: asClass(Chunker).singleton(),
    responseAssembler: asClass(ResponseAssembler).singleton(),
    keyAccessor: asClass(KeyAccessor).singleton(),
    progressiveService: asClass(ProgressiveDeliveryService).singleton(),
  });
};
