import { boolOptional } from "../boolean"
import { describeAdapterContract } from "./optional-adapter.contract"

describeAdapterContract({ adapter: boolOptional, samples: [true, false], zero: false })
