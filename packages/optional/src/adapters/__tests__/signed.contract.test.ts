import { int8Optional, int16Optional, int32Optional, int64Optional, intOptional } from "../signed"
import { describeAdapterContract } from "./optional-adapter.contract"

describeAdapterContract({ adapter: intOptional, samples: [42, Number.MIN_SAFE_INTEGER], zero: 0 })
describeAdapterContract({ adapter: int8Optional, samples: [-128, 127], zero: 0 })
describeAdapterContract({ adapter: int16Optional, samples: [-32768, 32767], zero: 0 })
describeAdapterContract({ adapter: int32Optional, samples: [-2147483648, 2147483647], zero: 0 })
describeAdapterContract({
  adapter: int64Optional,
  samples: [-(2n ** 63n), 2n ** 63n - 1n],
  zero: 0n,
})
