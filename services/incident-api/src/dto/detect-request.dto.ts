import { Allow } from "class-validator";

export class DetectRequestDto {
  // Repeated form fields arrive as an array; the service keeps the first one.
  @Allow()
  location_id?: string | string[];
}
