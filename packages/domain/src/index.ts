export * from "./business/business-config";
export * from "./availability/types";
export * from "./availability/interval";
export * from "./availability/slots";
export * from "./availability/alternatives";
export * from "./availability/checker";
export * from "./policies/rules";
export * from "./reservations/types";
export * from "./reservations/lifecycle";
export * from "./repo/reservation-repo";
export * from "./repo/memory-reservation-repo";
export * from "./services/reservation-service";
export * from "./knowledge/tokenize";
export * from "./knowledge/store";
export * from "./knowledge/retriever";
