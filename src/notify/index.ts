export { buildDigest, type DigestOptions } from "./digest";
export { deliverDigest, type DeliveryStatus, type DeliveryTarget } from "./deliver";
