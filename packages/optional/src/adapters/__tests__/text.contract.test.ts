import { runeOptional, stringOptional } from "../text"
import { describeAdapterContract } from "./optional-adapter.contract"

describeAdapterContract({ adapter: stringOptional, samples: ["héllo", "a b"], zero: "" })
describeAdapterContract({ adapter: runeOptional, samples: [0x1f600, 0x61], zero: 0 })
