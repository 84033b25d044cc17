import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { ObjectSource } from "../object-source"

describeConfigSourceContract({
  name: "ObjectSource",
  make: () => new ObjectSource({ db: { host: "localhost", replicas: ["a", "b"] }, port: 1 }),
  namePattern: /^object:overrides$/,
  expected: { db: { host: "localhost", replicas: ["a", "b"] }, port: 1 },
})
